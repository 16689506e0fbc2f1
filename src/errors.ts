/**
 * Error types for SMP operations.
 *
 * Every error carries a human-readable message; errors that map to a
 * numeric protocol value expose it as `code`.
 */

import { groupLabel } from "./groups.ts";
import {
  describeReturnCode,
  type ReturnCodeKind,
  returnCodeKind,
} from "./returnCodes.ts";
import type { SequenceNumber } from "./smp.ts";

/** Base error class for SMP-related errors. */
export class SmpError extends Error {
  constructor(
    message: string,
    public readonly code?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SmpError";
  }
}

/** Inclusive bounds accepted by {@link SmpManager.setMtu}. */
export const MTU_RANGE = { max: 1024, min: 73 } as const;

export class MtuOutOfRangeError extends SmpError {
  constructor(public readonly mtu: number) {
    super(
      `New MTU value ${mtu} is outside valid range of ${MTU_RANGE.min}...${MTU_RANGE.max}`,
    );
    this.name = "MtuOutOfRangeError";
  }
}

export class MtuUnchangedError extends SmpError {
  constructor(public readonly mtu: number) {
    super(`MTU value already set to ${mtu}`);
    this.name = "MtuUnchangedError";
  }
}

/** A response carried a non-zero protocol return code. */
export class ReturnCodeError extends SmpError {
  readonly kind: ReturnCodeKind;
  readonly description: string;

  constructor(code: number) {
    const description = describeReturnCode(code);
    super(`Remote error: ${description}`, code);
    this.kind = returnCodeKind(code);
    this.description = description;
    this.name = "ReturnCodeError";
  }
}

/** A response carried a group-scoped error known to that group's table. */
export class GroupReturnCodeError extends SmpError {
  constructor(
    public readonly group: number,
    code: number,
    public readonly reason: string,
  ) {
    super(`${groupLabel(group)} group error: ${reason} (code ${code})`, code);
    this.name = "GroupReturnCodeError";
  }
}

/** An expectation was registered for a sequence number still in flight. */
export class DuplicateSequenceError extends SmpError {
  constructor(public readonly sequenceNumber: SequenceNumber) {
    super(`Sequence number ${sequenceNumber} is already awaiting a response`);
    this.name = "DuplicateSequenceError";
  }
}

/** A result arrived for a sequence number nobody is waiting for. */
export class UnknownSequenceError extends SmpError {
  constructor(public readonly sequenceNumber: SequenceNumber) {
    super(`No pending request for sequence number ${sequenceNumber}`);
    this.name = "UnknownSequenceError";
  }
}

export class SmpTimeoutError extends SmpError {
  constructor(
    public readonly timeoutSeconds: number,
    public readonly sequenceNumber: SequenceNumber,
  ) {
    super(
      `Request ${sequenceNumber} timed out after ${timeoutSeconds} second(s)`,
    );
    this.name = "SmpTimeoutError";
  }
}

/** The transport went away while requests were outstanding. */
export class TransportClosedError extends SmpError {
  constructor(cause?: Error) {
    super(
      cause ? `Transport closed: ${cause.message}` : "Transport closed",
      undefined,
      { cause },
    );
    this.name = "TransportClosedError";
  }
}

export class ManagerClosedError extends SmpError {
  constructor() {
    super("Manager closed");
    this.name = "ManagerClosedError";
  }
}

export type SmpFrameErrorCode =
  | "truncated_frame"
  | "invalid_cbor"
  | "invalid_payload"
  | "missing_header";

/** Inbound bytes could not be decoded into a frame. */
export class SmpFrameError extends SmpError {
  constructor(
    public readonly reason: SmpFrameErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(`Frame error: ${message}`, undefined, { cause });
    this.name = "SmpFrameError";
  }
}

/** Coerce anything thrown into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
