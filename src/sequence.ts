import type { SequenceNumber } from "./smp.ts";

const SEQUENCE_MODULUS = 256;

/** Uniformly random 8-bit starting point. */
export function randomSequenceNumber(): SequenceNumber {
  return Math.floor(Math.random() * SEQUENCE_MODULUS);
}

export function isSequenceNumber(value: number): value is SequenceNumber {
  return Number.isInteger(value) && value >= 0 && value < SEQUENCE_MODULUS;
}

/**
 * Wrapping 8-bit counter. The random default start keeps a restarted client
 * from colliding with sequence numbers a device may still remember.
 */
export class SequenceNumberAllocator {
  #current: SequenceNumber;

  constructor(initial: SequenceNumber = randomSequenceNumber()) {
    if (!isSequenceNumber(initial)) {
      throw new RangeError(`Invalid initial sequence number: ${initial}`);
    }
    this.#current = initial;
  }

  /** The value the next call to {@link next} returns. */
  peek(): SequenceNumber {
    return this.#current;
  }

  /** Return the current value and advance (255 wraps to 0). */
  next(): SequenceNumber {
    const value = this.#current;
    this.#current = (value + 1) % SEQUENCE_MODULUS;
    return value;
  }
}
