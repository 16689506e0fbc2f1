/**
 * Transaction manager: issues pipelined SMP requests over a transport and
 * delivers their results to callers in issue order.
 */

import { getLogger, type Logger } from "@logtape/logtape";
import {
  createErr,
  isErr,
  isOk,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import { checkResponse } from "./errorRegistry.ts";
import {
  MTU_RANGE,
  ManagerClosedError,
  MtuOutOfRangeError,
  MtuUnchangedError,
  toError,
} from "./errors.ts";
import { buildPacket, framingForScheme, type SmpFraming } from "./frameBuilder.ts";
import { groupLabel, toGroupValue } from "./groups.ts";
import { ReorderBuffer } from "./reorderBuffer.ts";
import { SequenceNumberAllocator } from "./sequence.ts";
import {
  isSmpVersion,
  OPERATION_LABELS,
  type SequenceNumber,
  type SmpRequest,
  type SmpResponse,
  type SmpScheme,
  SmpVersion,
} from "./smp.ts";
import type { SmpTransport } from "./transport/transport.ts";

/** Final outcome handed to the caller of {@link SmpManager.send}. */
export type SmpResult = Result<SmpResponse, Error>;

export type SmpCallback = (result: SmpResult) => void;

/** Configuration accepted by {@link SmpManager}. */
export interface SmpManagerOptions {
  /** Used when a request names no timeout of its own. */
  defaultTimeoutSeconds: number;
  /** First sequence number to use; random when omitted. */
  initialSequenceNumber?: SequenceNumber;
  /** Initial MTU; defaults by transport scheme. */
  mtu?: number;
  logger: Logger;
}

const DEFAULT_MTU: Record<SmpScheme, number> = {
  ble: 524,
  "coap-ble": 1024,
  "coap-udp": 1024,
  udp: 1024,
};

/** MTU a manager starts with for a transport scheme. */
export function defaultMtu(scheme: SmpScheme): number {
  return DEFAULT_MTU[scheme];
}

function assertMtuInRange(mtu: number): void {
  if (!Number.isInteger(mtu) || mtu < MTU_RANGE.min || mtu > MTU_RANGE.max) {
    throw new MtuOutOfRangeError(mtu);
  }
}

/**
 * Sends requests over an {@link SmpTransport} with any number in flight.
 *
 * Responses may arrive in any order; each caller's callback is still invoked
 * exactly once and in the order the requests were sent. A request that
 * fails (timeout, transport error) releases its successors just like a
 * response does.
 *
 * The protocol version used for new requests follows the version of the
 * most recently delivered response, starting at SMPv2.
 */
export class SmpManager {
  static readonly DEFAULT_SEND_TIMEOUT_SECONDS = 40;
  static readonly FAST_TIMEOUT = 5;

  readonly #transport: SmpTransport;
  readonly #framing: SmpFraming;
  readonly #options: SmpManagerOptions;
  readonly #logger: Logger;
  readonly #sequence: SequenceNumberAllocator;
  readonly #buffer = new ReorderBuffer<SmpResult>();
  readonly #callbacks = new Map<SequenceNumber, SmpCallback>();
  #version: SmpVersion = SmpVersion.V2;
  #mtu: number;
  #closed = false;

  constructor(transport: SmpTransport, options: Partial<SmpManagerOptions> = {}) {
    this.#transport = transport;
    this.#framing = framingForScheme(transport.scheme);
    this.#options = {
      defaultTimeoutSeconds: SmpManager.DEFAULT_SEND_TIMEOUT_SECONDS,
      logger: getLogger(["smp-client", "manager"]),
      ...options,
    };
    this.#logger = this.#options.logger;
    this.#sequence = new SequenceNumberAllocator(
      this.#options.initialSequenceNumber,
    );
    const mtu = this.#options.mtu ?? defaultMtu(transport.scheme);
    assertMtuInRange(mtu);
    this.#mtu = mtu;
  }

  get transport(): SmpTransport {
    return this.#transport;
  }

  /** Version used to build the next request. */
  get protocolVersion(): SmpVersion {
    return this.#version;
  }

  get mtu(): number {
    return this.#mtu;
  }

  /** Sequence number the next request will carry. */
  get nextSequenceNumber(): SequenceNumber {
    return this.#sequence.peek();
  }

  /** Requests sent but not yet delivered to their callbacks. */
  get pendingCount(): number {
    return this.#buffer.size;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Change the MTU.
   *
   * @throws {MtuOutOfRangeError} outside 73...1024
   * @throws {MtuUnchangedError} when `mtu` is the current value
   */
  setMtu(mtu: number): void {
    assertMtuInRange(mtu);
    if (mtu === this.#mtu) {
      throw new MtuUnchangedError(mtu);
    }
    this.#mtu = mtu;
    this.#logger.info("MTU set to {mtu}", { mtu });
  }

  /**
   * Send a request. `onComplete` is called exactly once, with the response
   * or the error, after every earlier request's callback has run. An
   * exception thrown by `onComplete` is logged and does not hold back the
   * requests behind it.
   *
   * A non-zero return code in the response is delivered as an error.
   *
   * @returns The sequence number allocated to the request, or `undefined`
   *   when the manager is closed.
   * @throws RangeError when a header field does not fit (nothing is sent).
   */
  send(request: SmpRequest, onComplete: SmpCallback): SequenceNumber | undefined {
    if (this.#closed) {
      onComplete(createErr(new ManagerClosedError()));
      return undefined;
    }

    const sequenceNumber = this.#sequence.peek();
    const group = toGroupValue(request.group);
    const packet = buildPacket(
      {
        commandId: request.commandId,
        flags: request.flags ?? 0,
        group,
        operation: request.operation,
        payload: request.payload,
        sequenceNumber,
        version: this.#version,
      },
      this.#framing,
    );
    this.#sequence.next();

    const enqueued = this.#buffer.enqueueExpectation(sequenceNumber);
    if (isErr(enqueued)) {
      // All 256 sequence numbers are in flight.
      onComplete(createErr(unwrapErr(enqueued)));
      return sequenceNumber;
    }
    this.#callbacks.set(sequenceNumber, onComplete);

    const timeoutSeconds =
      request.timeoutSeconds ?? this.#options.defaultTimeoutSeconds;
    this.#logger.debug(
      "Sending {operation} (version {version}, group {group}, seq {sequenceNumber}, id {commandId})",
      {
        commandId: request.commandId,
        group: groupLabel(group),
        operation: OPERATION_LABELS[request.operation],
        sequenceNumber,
        version: this.#version,
      },
    );
    try {
      this.#transport.send(packet, timeoutSeconds, (result) =>
        this.#complete(sequenceNumber, result, onComplete),
      );
    } catch (error) {
      this.#complete(sequenceNumber, createErr(toError(error)), onComplete);
    }
    return sequenceNumber;
  }

  /** Promise flavour of {@link send}. */
  request(request: SmpRequest): Promise<SmpResult> {
    return new Promise((resolve) => {
      this.send(request, resolve);
    });
  }

  /**
   * Stop accepting work. Every request still awaiting delivery is completed
   * with {@link ManagerClosedError}, in issue order; results that arrive
   * afterwards are discarded.
   */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    const pending = this.#buffer.clear();
    this.#logger.info("Closing with {count} pending request(s)", {
      count: pending.length,
    });
    for (const sequenceNumber of pending) {
      const callback = this.#callbacks.get(sequenceNumber);
      this.#callbacks.delete(sequenceNumber);
      this.#invoke(
        sequenceNumber,
        callback,
        createErr(new ManagerClosedError()),
      );
    }
  }

  #complete(
    sequenceNumber: SequenceNumber,
    outcome: SmpResult,
    onComplete: SmpCallback,
  ): void {
    if (this.#closed) {
      this.#logger.debug("Discarding result for seq {sequenceNumber}", {
        sequenceNumber,
      });
      return;
    }
    const received = this.#buffer.received(outcome, sequenceNumber);
    if (isErr(received)) {
      // Delivered straight away, outside the ordering guarantee.
      const error = unwrapErr(received);
      this.#logger.error("{message}", { message: error.message });
      this.#invoke(sequenceNumber, onComplete, createErr(error));
      return;
    }
    if (unwrapOk(received)) {
      this.#buffer.deliver((seq, result) => this.#dispatch(seq, result));
    }
  }

  #dispatch(sequenceNumber: SequenceNumber, outcome: SmpResult): void {
    const callback = this.#callbacks.get(sequenceNumber);
    this.#callbacks.delete(sequenceNumber);

    let result = outcome;
    if (isOk(outcome)) {
      const response = unwrapOk(outcome);
      const { version } = response.header;
      this.#version = isSmpVersion(version) ? version : SmpVersion.V1;
      result = checkResponse(response);
    }

    if (isOk(result)) {
      this.#logger.debug("Response (seq {sequenceNumber}, version {version})", {
        sequenceNumber,
        version: this.#version,
      });
    } else {
      this.#logger.error("Request (seq {sequenceNumber}) failed: {message}", {
        message: unwrapErr(result).message,
        sequenceNumber,
      });
    }
    this.#invoke(sequenceNumber, callback, result);
  }

  /**
   * Run a caller's callback. An exception is logged and not rethrown, so
   * the requests queued behind it are still delivered.
   */
  #invoke(
    sequenceNumber: SequenceNumber,
    callback: SmpCallback | undefined,
    result: SmpResult,
  ): void {
    try {
      callback?.(result);
    } catch (error) {
      this.#logger.error(
        "Callback for seq {sequenceNumber} threw: {message}",
        { message: toError(error).message, sequenceNumber },
      );
    }
  }
}
