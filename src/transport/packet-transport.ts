import { getLogger, type Logger } from "@logtape/logtape";
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import {
  DuplicateSequenceError,
  SmpTimeoutError,
  TransportClosedError,
} from "../errors.ts";
import { EventEmitter } from "../eventEmitter.ts";
import { framingForScheme, type SmpFraming } from "../frameBuilder.ts";
import { parseFrame, parseResponse } from "../frameParser.ts";
import {
  isResponseOperation,
  type SequenceNumber,
  type SmpResponse,
  type SmpScheme,
} from "../smp.ts";
import type {
  ConnectableTransport,
  SmpCompletion,
  TransportState,
} from "./transport.ts";

/** Events emitted by every {@link PacketTransport}. */
export type PacketTransportEvents = {
  /** An encoded request was handed to the link. */
  request: [data: Uint8Array];
  /** A response matched a pending request. */
  response: [response: SmpResponse];
  /** Link level failure. */
  error: [error: Error];
  close: [];
  statechange: [state: TransportState];
};

interface PendingRequest {
  completion: SmpCompletion;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Base class for packet oriented transports.
 *
 * Outstanding requests are keyed by the sequence number in their header.
 * Inbound frames are parsed and routed to the request with the same
 * sequence number; every request is settled exactly once, by its response,
 * its timer or the link closing. Subclasses only move bytes: they implement
 * {@link postMessage} and feed received datagrams to {@link handleMessage}.
 */
export abstract class PacketTransport
  extends EventEmitter<PacketTransportEvents>
  implements ConnectableTransport
{
  readonly scheme: SmpScheme;
  readonly framing: SmpFraming;
  protected readonly logger: Logger;
  readonly #pending = new Map<SequenceNumber, PendingRequest>();
  #state: TransportState = "disconnected";

  constructor(scheme: SmpScheme, logger?: Logger) {
    super();
    this.scheme = scheme;
    this.framing = framingForScheme(scheme);
    this.logger = logger ?? getLogger(["smp-client", "transport"]);
  }

  get state(): TransportState {
    return this.#state;
  }

  get connected(): boolean {
    return this.#state === "connected";
  }

  /** Number of requests awaiting a response. */
  get pendingCount(): number {
    return this.#pending.size;
  }

  /** Sequence numbers awaiting a response, in send order. */
  get pendingSequenceNumbers(): SequenceNumber[] {
    return Array.from(this.#pending.keys());
  }

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;

  /** Write raw bytes to the link. Throws when they cannot be sent. */
  protected abstract postMessage(data: Uint8Array): void;

  send(
    data: Uint8Array,
    timeoutSeconds: number,
    completion: SmpCompletion,
  ): void {
    const frame = parseFrame(data, this.framing);
    if (isErr(frame)) {
      throw unwrapErr(frame);
    }
    const sequenceNumber = unwrapOk(frame).header.sequenceNumber;
    if (this.#pending.has(sequenceNumber)) {
      throw new DuplicateSequenceError(sequenceNumber);
    }

    // Registered before writing, so a reply delivered synchronously by the
    // link still finds its request.
    const timer = setTimeout(() => {
      this.#settle(
        sequenceNumber,
        createErr(new SmpTimeoutError(timeoutSeconds, sequenceNumber)),
      );
    }, timeoutSeconds * 1000);
    this.#pending.set(sequenceNumber, { completion, timer });

    try {
      this.postMessage(data);
    } catch (error) {
      clearTimeout(timer);
      this.#pending.delete(sequenceNumber);
      throw error;
    }
    this.emit("request", data);
  }

  protected setState(state: TransportState): void {
    if (this.#state === state) return;
    this.#state = state;
    this.emit("statechange", state);
  }

  /** Route one received datagram to its pending request. */
  protected handleMessage(data: Uint8Array): void {
    const parsed = parseResponse(data, this.framing);
    if (isErr(parsed)) {
      this.logger.warning("Dropping malformed frame: {reason}", {
        reason: unwrapErr(parsed).reason,
      });
      return;
    }
    const response = unwrapOk(parsed);
    const { operation, sequenceNumber } = response.header;
    if (!isResponseOperation(operation)) {
      this.logger.warning("Dropping non-response frame (op {operation})", {
        operation,
      });
      return;
    }
    if (!this.#pending.has(sequenceNumber)) {
      this.logger.warning(
        "Dropping unsolicited response for sequence {sequenceNumber}",
        { sequenceNumber },
      );
      return;
    }
    this.emit("response", response);
    this.#settle(sequenceNumber, createOk(response));
  }

  /** Settle one pending request with `error`; no-op when not pending. */
  protected failPending(sequenceNumber: SequenceNumber, error: Error): void {
    this.#settle(sequenceNumber, createErr(error));
  }

  /**
   * The link is gone: fail every pending request in send order, then emit
   * `error` (when a cause is given) and `close`.
   */
  protected handleClose(error?: Error): void {
    this.setState(error ? "error" : "disconnected");
    const pending = this.pendingSequenceNumbers;
    for (const sequenceNumber of pending) {
      this.#settle(sequenceNumber, createErr(new TransportClosedError(error)));
    }
    if (error) {
      this.emit("error", error);
    }
    this.emit("close");
  }

  #settle(
    sequenceNumber: SequenceNumber,
    result: Result<SmpResponse, Error>,
  ): void {
    const entry = this.#pending.get(sequenceNumber);
    if (!entry) return;
    clearTimeout(entry.timer);
    this.#pending.delete(sequenceNumber);
    entry.completion(result);
  }
}
