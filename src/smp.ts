import type { CborValue, SmpPayload } from "./cbor.ts";
import type { SmpGroup } from "./groups.ts";

/** 8-bit identifier correlating a request with its response (0-255). */
export type SequenceNumber = number;

/**
 * Operation codes carried in byte 1 of every header. Responses use the
 * request code + 1.
 */
export const SmpOperation = {
  Read: 0,
  ReadResponse: 1,
  Write: 2,
  WriteResponse: 3,
} as const;

export type SmpOperation = (typeof SmpOperation)[keyof typeof SmpOperation];

/** Request operations a client may issue. */
export type SmpRequestOperation =
  | typeof SmpOperation.Read
  | typeof SmpOperation.Write;

/** Human-readable operation labels used in logs. */
export const OPERATION_LABELS: Record<SmpOperation, string> = {
  [SmpOperation.Read]: "read",
  [SmpOperation.ReadResponse]: "read-response",
  [SmpOperation.Write]: "write",
  [SmpOperation.WriteResponse]: "write-response",
};

/** True for the two response operation codes. */
export function isResponseOperation(value: number): boolean {
  return value === SmpOperation.ReadResponse ||
    value === SmpOperation.WriteResponse;
}

/** Protocol revisions distinguished by header byte 0. */
export const SmpVersion = {
  V1: 0,
  V2: 1,
} as const;

export type SmpVersion = (typeof SmpVersion)[keyof typeof SmpVersion];

export function isSmpVersion(value: number): value is SmpVersion {
  return value === SmpVersion.V1 || value === SmpVersion.V2;
}

/**
 * Transport families. The scheme selects the framing (`coap-*` embed the
 * header in the payload map) and the default MTU.
 */
export type SmpScheme = "ble" | "udp" | "coap-ble" | "coap-udp";

/** Decoded 9-byte protocol header. */
export interface SmpHeader {
  version: number;
  operation: number;
  flags: number;
  /** Encoded payload length in bytes (excluding the embedded header key). */
  length: number;
  group: number;
  sequenceNumber: SequenceNumber;
  commandId: number;
}

/** SMPv2 group-scoped error, carried as `err: { group, rc }`. */
export interface GroupReturnCode {
  group: number;
  rc: number;
}

/** A decoded response frame plus the return codes read from its payload. */
export interface SmpResponse {
  header: SmpHeader;
  payload: SmpPayload;
  /** SMPv1 `rc` value; 0 when absent. */
  returnCode: number;
  groupReturnCode?: GroupReturnCode;
}

/** A request as handed to {@link SmpManager.send}. */
export interface SmpRequest {
  group: SmpGroup | number;
  operation: SmpRequestOperation;
  commandId: number;
  flags?: number;
  payload?: ReadonlyMap<string, CborValue>;
  /** Seconds before the transport reports a timeout. */
  timeoutSeconds?: number;
}
