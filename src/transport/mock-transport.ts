// Mock transport implementation for testing
// Provides a controllable transport that can answer requests in any order

import type { Logger } from "@logtape/logtape";
import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import type { CborValue } from "../cbor.ts";
import { buildPacket } from "../frameBuilder.ts";
import { parseFrame } from "../frameParser.ts";
import {
  type SequenceNumber,
  type SmpHeader,
  SmpOperation,
} from "../smp.ts";
import { PacketTransport } from "./packet-transport.ts";
import type { MockTransportConfig } from "./transport.ts";

/** Options controlling test / simulation behaviour of {@link MockTransport}. */
export interface MockTransportOptions {
  /** Artificial delay before a successful connect resolves (ms). */
  connectDelay?: number;
  /** When true `connect()` will reject with `errorMessage`. */
  shouldFailConnect?: boolean;
  /** When true `send()` throws instead of recording the packet. */
  shouldFailSend?: boolean;
  /** Error message used for simulated failures. */
  errorMessage?: string;
  logger?: Logger;
}

export interface MockResponseOptions {
  /** Version byte of the response header; defaults to the request's. */
  version?: number;
}

/**
 * In-memory transport used for unit tests.
 *
 * Every sent packet is recorded; tests then answer or fail any pending
 * sequence number, in any order, to drive the manager deterministically.
 */
export class MockTransport extends PacketTransport {
  readonly name: string;
  private options: Required<Omit<MockTransportOptions, "logger">>;
  readonly #requests = new Map<SequenceNumber, SmpHeader>();

  public sentData: Uint8Array[] = [];

  constructor(
    public readonly config: MockTransportConfig,
    options: MockTransportOptions = {},
  ) {
    super(config.scheme ?? "ble", options.logger);
    this.name = config.name ?? "mock";
    this.options = {
      connectDelay: 0,
      errorMessage: "Mock transport error",
      shouldFailConnect: false,
      shouldFailSend: false,
      ...options,
    };
  }

  /** Establish a simulated connection (optionally delayed / failed). */
  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    this.setState("connecting");

    if (this.options.connectDelay > 0) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.connectDelay),
      );
    }

    if (this.options.shouldFailConnect) {
      this.setState("error");
      throw new Error(this.options.errorMessage);
    }
    this.setState("connected");
  }

  /** Terminate the simulated connection, failing anything still pending. */
  async disconnect(): Promise<void> {
    if (this.state === "disconnected") {
      return;
    }
    this.handleClose();
  }

  protected postMessage(data: Uint8Array): void {
    if (!this.connected) {
      throw new Error("Transport not connected");
    }
    if (this.options.shouldFailSend) {
      throw new Error(this.options.errorMessage);
    }
    const frame = parseFrame(data, this.framing);
    if (isErr(frame)) {
      throw unwrapErr(frame);
    }
    const { header } = unwrapOk(frame);
    this.#requests.set(header.sequenceNumber, header);
    this.sentData.push(new Uint8Array(data));
  }

  // Testing utilities

  /**
   * Answer the pending request with `sequenceNumber`. The response mirrors
   * the request header (operation + 1, same group and command).
   */
  public respond(
    sequenceNumber: SequenceNumber,
    payload: ReadonlyMap<string, CborValue> = new Map([["rc", 0]]),
    options: MockResponseOptions = {},
  ): void {
    const request = this.#requests.get(sequenceNumber);
    if (!request) {
      throw new Error(`No recorded request for sequence ${sequenceNumber}`);
    }
    this.#requests.delete(sequenceNumber);
    const response = buildPacket(
      {
        commandId: request.commandId,
        flags: request.flags,
        group: request.group,
        operation: responseOperation(request.operation),
        payload,
        sequenceNumber,
        version: options.version ?? request.version,
      },
      this.framing,
    );
    this.simulateData(response);
  }

  /** Fail the pending request with `sequenceNumber`. */
  public fail(sequenceNumber: SequenceNumber, error: Error): void {
    this.#requests.delete(sequenceNumber);
    this.failPending(sequenceNumber, error);
  }

  /** Manually inject inbound data as if it was received from the peer. */
  public simulateData(data: Uint8Array): void {
    if (this.connected) {
      this.handleMessage(data);
    }
  }

  /** Simulate an abrupt link failure. */
  public simulateDisconnect(error?: Error): void {
    if (this.connected) {
      this.handleClose(error);
    }
  }

  /** Returns the last recorded outbound frame (if any). */
  public getLastSentData(): Uint8Array | undefined {
    return this.sentData[this.sentData.length - 1];
  }

  /** Clear all recorded outbound frames. */
  public clearSentData(): void {
    this.sentData = [];
  }
}

function responseOperation(operation: number): SmpOperation {
  return operation === SmpOperation.Write
    ? SmpOperation.WriteResponse
    : SmpOperation.ReadResponse;
}
