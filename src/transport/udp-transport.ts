// UDP transport implementation
// Carries SMP datagrams (plain or CoAP framed) over a connected node:dgram socket

import { createSocket } from "node:dgram";
import type { Logger } from "@logtape/logtape";
import { toError } from "../errors.ts";
import { PacketTransport } from "./packet-transport.ts";
import type { UdpTransportConfig } from "./transport.ts";

/** The subset of `dgram.Socket` the transport uses. */
export interface UdpSocket {
  connect(port: number, address: string, callback: () => void): void;
  send(msg: Uint8Array, callback: (error: Error | null) => void): void;
  close(callback?: () => void): void;
  on(event: "message", listener: (msg: Uint8Array) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface UdpTransportOptions {
  /** Socket factory; tests inject an in-process fake. */
  createSocket?: () => UdpSocket;
  logger?: Logger;
}

/**
 * SMP over UDP. Each request and response is exactly one datagram, so no
 * stream reassembly is needed.
 */
export class UdpTransport extends PacketTransport {
  readonly #createSocket: () => UdpSocket;
  #socket: UdpSocket | undefined;
  #rejectConnect: ((error: Error) => void) | undefined;

  constructor(
    public readonly config: UdpTransportConfig,
    options: UdpTransportOptions = {},
  ) {
    super(config.scheme ?? "udp", options.logger);
    this.#createSocket = options.createSocket ?? (() => createSocket("udp4"));
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    this.setState("connecting");
    const socket = this.#createSocket();
    socket.on("message", (msg) => this.handleMessage(msg));
    socket.on("error", (error) => this.#handleSocketError(socket, error));

    await new Promise<void>((resolve, reject) => {
      this.#rejectConnect = reject;
      socket.connect(this.config.port, this.config.host, () => {
        this.#rejectConnect = undefined;
        resolve();
      });
    });
    this.#socket = socket;
    this.setState("connected");
    this.logger.debug("Connected to {host}:{port}", {
      host: this.config.host,
      port: this.config.port,
    });
  }

  async disconnect(): Promise<void> {
    const socket = this.#socket;
    if (!socket) {
      return;
    }
    this.#socket = undefined;
    await new Promise<void>((resolve) => socket.close(resolve));
    this.handleClose();
  }

  protected postMessage(data: Uint8Array): void {
    const socket = this.#socket;
    if (!socket || !this.connected) {
      throw new Error("Transport not connected");
    }
    socket.send(data, (error) => {
      if (error) {
        this.#handleSocketError(socket, error);
      }
    });
  }

  #handleSocketError(socket: UdpSocket, cause: unknown): void {
    const error = toError(cause);
    const rejectConnect = this.#rejectConnect;
    if (rejectConnect) {
      this.#rejectConnect = undefined;
      socket.close();
      this.setState("error");
      rejectConnect(error);
      return;
    }
    if (this.#socket !== socket) {
      return;
    }
    this.logger.error("Socket error: {message}", { message: error.message });
    this.#socket = undefined;
    socket.close();
    this.handleClose(error);
  }
}
