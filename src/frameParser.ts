/**
 * Pure functions for parsing SMP frames and responses.
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import {
  type CborValue,
  decodePayload,
  normalizeBytes,
  type SmpPayload,
  toUnsigned,
} from "./cbor.ts";
import { SmpFrameError } from "./errors.ts";
import { HEADER_KEY, HEADER_SIZE, type SmpFraming } from "./frameBuilder.ts";
import type { GroupReturnCode, SmpHeader, SmpResponse } from "./smp.ts";

/** A decoded frame: header plus payload (without the embedded header key). */
export interface SmpFrame {
  header: SmpHeader;
  payload: SmpPayload;
}

/** Decode the 9-byte header at the start of `bytes`. */
export function parseHeader(bytes: Uint8Array): Result<SmpHeader, SmpFrameError> {
  if (bytes.length < HEADER_SIZE) {
    return createErr(
      new SmpFrameError(
        "truncated_frame",
        `Header too short: expected ${HEADER_SIZE} bytes, got ${bytes.length}`,
      ),
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return createOk({
    commandId: view.getUint8(8),
    flags: view.getUint8(2),
    group: view.getUint16(5, false),
    length: view.getUint16(3, false),
    operation: view.getUint8(1),
    sequenceNumber: view.getUint8(7),
    version: view.getUint8(0),
  });
}

/**
 * Parse a frame in either framing. Works for requests and responses alike.
 *
 * Datagram frames must contain at least as many payload bytes as the header
 * declares; an empty payload is accepted as an empty map.
 */
export function parseFrame(
  data: Uint8Array,
  framing: SmpFraming,
): Result<SmpFrame, SmpFrameError> {
  const bytes = normalizeBytes(data);
  return framing === "coap" ? parseCoapFrame(bytes) : parseDatagramFrame(bytes);
}

function parseDatagramFrame(bytes: Uint8Array): Result<SmpFrame, SmpFrameError> {
  const headerResult = parseHeader(bytes);
  if (isErr(headerResult)) return headerResult;
  const header = unwrapOk(headerResult);

  const end = HEADER_SIZE + header.length;
  if (bytes.length < end) {
    return createErr(
      new SmpFrameError(
        "truncated_frame",
        `Frame truncated: expected ${end} bytes, got ${bytes.length}`,
      ),
    );
  }
  if (header.length === 0) {
    return createOk({ header, payload: new Map() });
  }

  const payloadResult = decodePayload(bytes.slice(HEADER_SIZE, end));
  if (isErr(payloadResult)) return payloadResult;
  return createOk({ header, payload: unwrapOk(payloadResult) });
}

function parseCoapFrame(bytes: Uint8Array): Result<SmpFrame, SmpFrameError> {
  const payloadResult = decodePayload(bytes);
  if (isErr(payloadResult)) return payloadResult;
  const payload = unwrapOk(payloadResult);

  const embedded = payload.get(HEADER_KEY);
  if (!(embedded instanceof Uint8Array)) {
    return createErr(
      new SmpFrameError(
        "missing_header",
        `Payload has no "${HEADER_KEY}" byte string`,
      ),
    );
  }
  const headerResult = parseHeader(embedded);
  if (isErr(headerResult)) return headerResult;

  payload.delete(HEADER_KEY);
  return createOk({ header: unwrapOk(headerResult), payload });
}

/**
 * Extract the return codes of a response payload: the SMPv1 `rc` key and
 * the SMPv2 `err: { group, rc }` map.
 */
export function readReturnCodes(payload: ReadonlyMap<string, CborValue>): {
  returnCode: number;
  groupReturnCode?: GroupReturnCode;
} {
  const returnCode = toUnsigned(payload.get("rc")) ?? 0;
  const err = payload.get("err");
  if (err instanceof Map) {
    const group = toUnsigned(err.get("group"));
    const rc = toUnsigned(err.get("rc"));
    if (group !== undefined && rc !== undefined) {
      return { groupReturnCode: { group, rc }, returnCode };
    }
  }
  return { returnCode };
}

/** Parse a response frame and read its return codes. */
export function parseResponse(
  data: Uint8Array,
  framing: SmpFraming,
): Result<SmpResponse, SmpFrameError> {
  const frameResult = parseFrame(data, framing);
  if (isErr(frameResult)) return frameResult;
  const frame = unwrapOk(frameResult);
  return createOk({ ...frame, ...readReturnCodes(frame.payload) });
}
