/**
 * Reorder buffer for pipelined requests.
 *
 * Results may arrive in any order; the buffer releases them strictly in the
 * order their expectations were enqueued. Ordering is by queue position
 * only, never by numeric comparison, so sequence number wraparound has no
 * effect.
 */

import { createErr, createOk, type Result } from "option-t/plain_result";
import { DuplicateSequenceError, UnknownSequenceError } from "./errors.ts";
import type { SequenceNumber } from "./smp.ts";

type Slot<V> = { state: "pending" } | { state: "filled"; outcome: V };

export class ReorderBuffer<V> {
  /** Pending sequence numbers, oldest first. */
  readonly #queue: SequenceNumber[] = [];
  readonly #slots = new Map<SequenceNumber, Slot<V>>();

  /** Number of expectations not yet delivered. */
  get size(): number {
    return this.#queue.length;
  }

  has(sequenceNumber: SequenceNumber): boolean {
    return this.#slots.has(sequenceNumber);
  }

  /** Append an expectation with an empty outcome slot. */
  enqueueExpectation(
    sequenceNumber: SequenceNumber,
  ): Result<void, DuplicateSequenceError> {
    if (this.#slots.has(sequenceNumber)) {
      return createErr(new DuplicateSequenceError(sequenceNumber));
    }
    this.#queue.push(sequenceNumber);
    this.#slots.set(sequenceNumber, { state: "pending" });
    return createOk(undefined);
  }

  /**
   * Fill the outcome slot of a pending expectation.
   *
   * @returns `true` when the head of the queue is filled, i.e. a call to
   *   {@link deliver} will make progress. Nothing is delivered here.
   */
  received(
    outcome: V,
    sequenceNumber: SequenceNumber,
  ): Result<boolean, UnknownSequenceError> {
    const slot = this.#slots.get(sequenceNumber);
    if (slot === undefined || slot.state === "filled") {
      return createErr(new UnknownSequenceError(sequenceNumber));
    }
    this.#slots.set(sequenceNumber, { outcome, state: "filled" });
    return createOk(this.#headIsFilled());
  }

  /**
   * Hand every contiguous filled entry at the head of the queue to
   * `callback`, oldest first. Stops at the first entry still waiting.
   *
   * Each entry is removed before its callback runs, so a callback that
   * enqueues or receives re-entrantly sees a consistent buffer. A throwing
   * callback does not stop the drain: the remaining entries are still
   * delivered and the first error is rethrown afterwards.
   *
   * @returns Number of entries delivered.
   */
  deliver(callback: (sequenceNumber: SequenceNumber, outcome: V) => void): number {
    let delivered = 0;
    const errors: unknown[] = [];
    while (this.#queue.length > 0) {
      const head = this.#queue[0];
      const slot = this.#slots.get(head);
      if (slot === undefined || slot.state !== "filled") break;
      this.#queue.shift();
      this.#slots.delete(head);
      delivered++;
      try {
        callback(head, slot.outcome);
      } catch (error) {
        errors.push(error);
      }
    }
    if (errors.length > 0) {
      throw errors[0];
    }
    return delivered;
  }

  /** Drop every expectation, returning their sequence numbers oldest first. */
  clear(): SequenceNumber[] {
    const pending = this.#queue.splice(0);
    this.#slots.clear();
    return pending;
  }

  #headIsFilled(): boolean {
    if (this.#queue.length === 0) return false;
    return this.#slots.get(this.#queue[0])?.state === "filled";
  }
}
