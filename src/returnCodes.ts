/**
 * Protocol-level return codes.
 *
 * Every response may carry an `rc` value; absence means success. Codes at or
 * above {@link USER_DEFINED_ERROR_BASE} are application defined.
 */

export const RETURN_CODES = {
  ok: 0,
  unknown: 1,
  noMemory: 2,
  invalidValue: 3,
  timeout: 4,
  noEntry: 5,
  badState: 6,
  responseTooLong: 7,
  unsupported: 8,
  corruptPayload: 9,
  busy: 10,
  accessDenied: 11,
  protocolVersionTooOld: 12,
  protocolVersionTooNew: 13,
  userDefined: 256,
} as const;

export type ReturnCodeKind = keyof typeof RETURN_CODES | "unrecognized";

/** First code reserved for user-defined errors. */
export const USER_DEFINED_ERROR_BASE = RETURN_CODES.userDefined;

const DESCRIPTIONS: Readonly<Record<number, string>> = {
  0: "OK",
  1: "Unknown error",
  2: "No memory",
  3: "Invalid value",
  4: "Timeout",
  // For filesystem commands this usually means the mount point does not
  // match the target firmware.
  5: "No entry",
  6: "Bad state",
  7: "Response is too long",
  8: "Not supported",
  9: "Corrupt payload",
  10: "Busy, try again later",
  11: "Access denied",
  12: "Requested protocol version is too old",
  13: "Requested protocol version is too new",
};

const KINDS_BY_CODE = new Map<number, ReturnCodeKind>();
for (const [kind, code] of Object.entries(RETURN_CODES)) {
  if (isReturnCodeKind(kind)) KINDS_BY_CODE.set(code, kind);
}

function isReturnCodeKind(kind: string): kind is ReturnCodeKind {
  return kind === "unrecognized" || Object.hasOwn(RETURN_CODES, kind);
}

/** Category of a numeric code. */
export function returnCodeKind(code: number): ReturnCodeKind {
  const kind = KINDS_BY_CODE.get(code);
  if (kind !== undefined) return kind;
  return code >= USER_DEFINED_ERROR_BASE ? "userDefined" : "unrecognized";
}

/** Human-readable text for a numeric code. */
export function describeReturnCode(code: number): string {
  if (code >= USER_DEFINED_ERROR_BASE) {
    return `User-defined error (code ${code})`;
  }
  return DESCRIPTIONS[code] ?? `Unrecognized (code ${code})`;
}

export function isSuccessCode(code: number): boolean {
  return code === RETURN_CODES.ok;
}

/** False for the codes that signal an unsupported command or version. */
export function isSupported(code: number): boolean {
  return (
    code !== RETURN_CODES.unsupported &&
    code !== RETURN_CODES.protocolVersionTooOld &&
    code !== RETURN_CODES.protocolVersionTooNew
  );
}
