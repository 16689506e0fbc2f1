// Transport module exports and registration
// Sets up the transport registry and exports transport implementations

import { MockTransport } from "./mock-transport.ts";
import {
  type ConnectableTransport,
  type TransportConfig,
  TransportRegistry,
} from "./transport.ts";
import { UdpTransport } from "./udp-transport.ts";

/**
 * Register the built-in transports with the TransportRegistry.
 *
 * Each factory validates the incoming config before constructing.
 */
TransportRegistry.register("udp", (config) => {
  if (config.type !== "udp") {
    throw new Error("Invalid config type for udp transport");
  }
  return new UdpTransport(config);
});

TransportRegistry.register("mock", (config) => {
  if (config.type !== "mock") {
    throw new Error("Invalid config type for mock transport");
  }
  return new MockTransport(config);
});

export {
  MockTransport,
  type MockResponseOptions,
  type MockTransportOptions,
} from "./mock-transport.ts";
export {
  PacketTransport,
  type PacketTransportEvents,
} from "./packet-transport.ts";
// Re-export transport types and implementations for consumers
export type {
  ConnectableTransport,
  MockTransportConfig,
  SmpCompletion,
  SmpTransport,
  TransportConfig,
  TransportFactory,
  TransportState,
  UdpTransportConfig,
} from "./transport.ts";
export { TransportRegistry } from "./transport.ts";
export {
  type UdpSocket,
  UdpTransport,
  type UdpTransportOptions,
} from "./udp-transport.ts";

// Convenience helper to create transports via the registry
export function createTransport(config: TransportConfig): ConnectableTransport {
  return TransportRegistry.create(config);
}
