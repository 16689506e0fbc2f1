/**
 * Pure functions for building SMP request packets.
 *
 * Two framings exist. Datagram transports (BLE, plain UDP) send the 9-byte
 * header followed by the CBOR payload. CoAP transports embed the header in
 * the payload map under {@link HEADER_KEY} and send the map alone.
 */

import { type CborValue, encodePayload } from "./cbor.ts";
import type {
  SequenceNumber,
  SmpHeader,
  SmpOperation,
  SmpScheme,
} from "./smp.ts";

/** Size of the binary header in bytes. */
export const HEADER_SIZE = 9;

/** Payload key carrying the embedded header in CoAP framing. */
export const HEADER_KEY = "_h";

export type SmpFraming = "datagram" | "coap";

export function framingForScheme(scheme: SmpScheme): SmpFraming {
  return scheme === "coap-ble" || scheme === "coap-udp" ? "coap" : "datagram";
}

/** Everything needed to serialize one request. */
export interface PacketRequest {
  /** Normally an {@link SmpVersion}; any byte is accepted. */
  version: number;
  operation: SmpOperation;
  flags: number;
  group: number;
  sequenceNumber: SequenceNumber;
  commandId: number;
  payload?: ReadonlyMap<string, CborValue>;
}

function assertField(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`Header field ${name} out of range: ${value}`);
  }
}

/**
 * Serialize a header.
 *
 * Layout (9 bytes, multi-byte fields big-endian):
 * - [0]   Version
 * - [1]   Operation
 * - [2]   Flags
 * - [3-4] Payload length
 * - [5-6] Group id
 * - [7]   Sequence number
 * - [8]   Command id
 *
 * @throws RangeError when a field does not fit its slot.
 */
export function encodeHeader(header: SmpHeader): Uint8Array {
  assertField("version", header.version, 0xff);
  assertField("operation", header.operation, 0xff);
  assertField("flags", header.flags, 0xff);
  assertField("length", header.length, 0xffff);
  assertField("group", header.group, 0xffff);
  assertField("sequenceNumber", header.sequenceNumber, 0xff);
  assertField("commandId", header.commandId, 0xff);

  const bytes = new Uint8Array(HEADER_SIZE);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, header.version);
  view.setUint8(1, header.operation);
  view.setUint8(2, header.flags);
  view.setUint16(3, header.length, false);
  view.setUint16(5, header.group, false);
  view.setUint8(7, header.sequenceNumber);
  view.setUint8(8, header.commandId);
  return bytes;
}

/**
 * Build a request packet for the given framing.
 *
 * The header's length field is the encoded size of the payload without
 * {@link HEADER_KEY}. Identical inputs always produce identical bytes, so a
 * retransmission of the same sequence number is byte-for-byte the same.
 */
export function buildPacket(
  request: PacketRequest,
  framing: SmpFraming,
): Uint8Array {
  const payload = new Map<string, CborValue>(request.payload ?? []);
  const stripped = new Map<string, CborValue>(payload);
  stripped.delete(HEADER_KEY);
  const encoded = encodePayload(stripped);

  const header = encodeHeader({
    commandId: request.commandId,
    flags: request.flags,
    group: request.group,
    length: encoded.length,
    operation: request.operation,
    sequenceNumber: request.sequenceNumber,
    version: request.version,
  });

  if (framing === "coap") {
    // A caller-provided header (e.g. a resend) is kept as is.
    if (!payload.has(HEADER_KEY)) {
      payload.set(HEADER_KEY, header);
    }
    return encodePayload(payload);
  }

  const packet = new Uint8Array(HEADER_SIZE + encoded.length);
  packet.set(header, 0);
  packet.set(encoded, HEADER_SIZE);
  return packet;
}
