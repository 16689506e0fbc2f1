/**
 * Transport abstraction for SMP communication.
 *
 * The manager only needs {@link SmpTransport}: a scheme (which selects the
 * framing) and a `send` that reports the matching response, a timeout or a
 * failure through a completion callback. Concrete transports add a
 * connect/disconnect lifecycle on top ({@link ConnectableTransport}) and are
 * created from a discriminated config union through the registry below.
 */

import type { Result } from "option-t/plain_result";
import type { SmpResponse, SmpScheme } from "../smp.ts";

/** Receives the outcome of one request, exactly once. */
export type SmpCompletion = (result: Result<SmpResponse, Error>) => void;

/** Minimal contract the transaction manager drives. */
export interface SmpTransport {
  readonly scheme: SmpScheme;
  /**
   * Transmit an encoded request. May throw synchronously when the bytes
   * cannot be sent at all; otherwise `completion` is called exactly once.
   */
  send(data: Uint8Array, timeoutSeconds: number, completion: SmpCompletion): void;
}

/** Configuration for a UDP transport (plain or CoAP framing). */
export interface UdpTransportConfig {
  type: "udp";
  host: string;
  port: number;
  /** Defaults to `"udp"`. */
  scheme?: "udp" | "coap-udp";
}

/** Configuration for the in-memory / test oriented mock transport. */
export interface MockTransportConfig {
  type: "mock";
  /** Defaults to `"ble"`. */
  scheme?: SmpScheme;
  name?: string;
}

/** Discriminated union of all supported transport configuration objects. */
export type TransportConfig = UdpTransportConfig | MockTransportConfig;

/** Lifecycle states reported by a transport. */
export type TransportState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "error";

/** A transport with an explicit connection lifecycle. */
export interface ConnectableTransport extends SmpTransport {
  readonly state: TransportState;
  /** Convenience boolean alias for `state === "connected"`. */
  readonly connected: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}

/**
 * Factory responsible for instantiating a transport. Factories receive the
 * full union and reject configs of another type.
 */
export type TransportFactory = (config: TransportConfig) => ConnectableTransport;

const factories = new Map<string, TransportFactory>();

/**
 * Public registry helper for managing available transports.
 *
 * Typical usage: `TransportRegistry.register("udp", cfg => new UdpTransport(cfg))`.
 */
export const TransportRegistry = {
  /** Create a concrete transport instance for the given config. */
  create(config: TransportConfig): ConnectableTransport {
    const factory = factories.get(config.type);
    if (!factory) {
      throw new Error(`Unknown transport type: ${config.type}`);
    }
    return factory(config);
  },

  /** List currently registered transport type discriminators. */
  getRegisteredTypes(): string[] {
    return Array.from(factories.keys());
  },

  /** Register (or overwrite) a transport factory for a given discriminator. */
  register(type: TransportConfig["type"], factory: TransportFactory) {
    factories.set(type, factory);
  },
} as const;
