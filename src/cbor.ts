/**
 * Thin adapter over the CBOR codec. Payloads are string-keyed maps. The
 * codec writes map entries in insertion order, so maps are put in canonical
 * key order (shorter encoded key first, then bytewise) before encoding:
 * maps with the same entries always produce the same bytes.
 */

import { type CBORType, decodeCBOR, encodeCBOR } from "@levischuck/tiny-cbor";
import { createErr, createOk, type Result } from "option-t/plain_result";
import { SmpFrameError } from "./errors.ts";

/** Any value the codec can carry. */
export type CborValue = CBORType;

/** String-keyed payload map sent with every request. */
export type SmpPayload = Map<string, CborValue>;

/** Encode a payload map in canonical key order, nested maps included. */
export function encodePayload(
  payload: ReadonlyMap<string, CborValue>,
): Uint8Array {
  return encodeCBOR(canonicalize(new Map<string | number, CBORType>(payload)));
}

function canonicalize(value: CBORType): CBORType {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value instanceof Map) {
    const entries = Array.from(value, ([key, entry]) => ({
      encodedKey: encodeCBOR(key),
      key,
      value: canonicalize(entry),
    }));
    entries.sort((a, b) => compareEncodedKeys(a.encodedKey, b.encodedKey));
    return new Map<string | number, CBORType>(
      entries.map(({ key, value: entry }): [string | number, CBORType] => [
        key,
        entry,
      ]),
    );
  }
  return value;
}

function compareEncodedKeys(a: Uint8Array, b: Uint8Array): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return 0;
}

/**
 * Build a payload map from a plain object. Nested plain objects become
 * nested maps; arrays are converted element-wise.
 */
export function payloadFromObject(
  object: Readonly<Record<string, unknown>>,
): SmpPayload {
  const payload: SmpPayload = new Map();
  for (const [key, value] of Object.entries(object)) {
    payload.set(key, toCborValue(value));
  }
  return payload;
}

function toCborValue(value: unknown): CborValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    value instanceof Uint8Array
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toCborValue);
  }
  if (value instanceof Map) {
    const map = new Map<string | number, CBORType>();
    for (const [key, entry] of value) {
      if (typeof key !== "string" && typeof key !== "number") {
        throw new TypeError(`Unsupported map key type: ${typeof key}`);
      }
      map.set(key, toCborValue(entry));
    }
    return map;
  }
  if (typeof value === "object") {
    return new Map<string | number, CBORType>(
      Object.entries(value).map(([key, entry]) => [key, toCborValue(entry)]),
    );
  }
  throw new TypeError(`Unsupported payload value type: ${typeof value}`);
}

/**
 * The codec only accepts plain Uint8Array instances, not subclasses such as
 * the Buffer objects handed out by node:dgram.
 */
export function normalizeBytes(data: Uint8Array): Uint8Array {
  if (data.constructor === Uint8Array) {
    return data;
  }
  return new Uint8Array(data);
}

/** Decode bytes that must hold a single string-keyed map. */
export function decodePayload(
  data: Uint8Array,
): Result<SmpPayload, SmpFrameError> {
  let decoded: CBORType;
  try {
    decoded = decodeCBOR(normalizeBytes(data));
  } catch (error) {
    return createErr(
      new SmpFrameError(
        "invalid_cbor",
        `Failed to decode CBOR payload: ${error instanceof Error ? error.message : String(error)}`,
        error,
      ),
    );
  }
  if (!(decoded instanceof Map)) {
    return createErr(
      new SmpFrameError("invalid_payload", "Payload is not a CBOR map"),
    );
  }
  const payload: SmpPayload = new Map();
  for (const [key, value] of decoded) {
    if (typeof key !== "string") {
      return createErr(
        new SmpFrameError(
          "invalid_payload",
          `Payload map key ${String(key)} is not a string`,
        ),
      );
    }
    payload.set(key, value);
  }
  return createOk(payload);
}

/** Read a non-negative integer out of a decoded value. */
export function toUnsigned(value: CborValue | undefined): number | undefined {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value === "bigint" && value >= 0n) {
    return Number(value);
  }
  return undefined;
}
