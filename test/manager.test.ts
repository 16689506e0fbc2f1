import { configure, type LogRecord, reset } from "@logtape/logtape";
import fc from "fast-check";
import {
  createErr,
  createOk,
  isErr,
  isOk,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CborValue } from "../src/cbor.ts";
import {
  GroupReturnCodeError,
  ManagerClosedError,
  MtuOutOfRangeError,
  MtuUnchangedError,
  ReturnCodeError,
  SmpTimeoutError,
  UnknownSequenceError,
} from "../src/errors.ts";
import { parseHeader } from "../src/frameParser.ts";
import "../src/groups/index.ts";
import { namedGroup } from "../src/groups.ts";
import { defaultMtu, SmpManager, type SmpResult } from "../src/manager.ts";
import {
  type SmpRequest,
  type SmpResponse,
  SmpOperation,
  SmpVersion,
} from "../src/smp.ts";
import { MockTransport } from "../src/transport/mock-transport.ts";
import type {
  SmpCompletion,
  SmpTransport,
} from "../src/transport/transport.ts";

const echo: SmpRequest = {
  commandId: 0,
  group: namedGroup("os"),
  operation: SmpOperation.Write,
  payload: new Map([["d", "hi"]]),
};

function makeResponse(sequenceNumber: number, version = 1): SmpResponse {
  return {
    header: {
      commandId: 0,
      flags: 0,
      group: 0,
      length: 1,
      operation: SmpOperation.WriteResponse,
      sequenceNumber,
      version,
    },
    payload: new Map(),
    returnCode: 0,
  };
}

/** Captures completions so tests can settle requests by hand. */
class FakeTransport implements SmpTransport {
  readonly scheme = "udp";
  readonly sent: Uint8Array[] = [];
  readonly completions: SmpCompletion[] = [];

  send(data: Uint8Array, _timeoutSeconds: number, completion: SmpCompletion) {
    this.sent.push(data);
    this.completions.push(completion);
  }
}

function sequenceOf(result: SmpResult): number {
  return unwrapOk(result).header.sequenceNumber;
}

describe("SmpManager", () => {
  describe("ordering", () => {
    let transport: MockTransport;
    let manager: SmpManager;

    beforeEach(async () => {
      transport = new MockTransport({ type: "mock" });
      await transport.connect();
      manager = new SmpManager(transport, { initialSequenceNumber: 254 });
    });

    it("assigns consecutive sequence numbers with wraparound", () => {
      expect(manager.send(echo, () => {})).toBe(254);
      expect(manager.send(echo, () => {})).toBe(255);
      expect(manager.send(echo, () => {})).toBe(0);
      expect(manager.nextSequenceNumber).toBe(1);
      expect(
        transport.sentData.map(
          (data) => unwrapOk(parseHeader(data)).sequenceNumber,
        ),
      ).toEqual([254, 255, 0]);
    });

    it("blocks later responses behind the head", () => {
      const order: number[] = [];
      for (let i = 0; i < 3; i++) {
        manager.send(echo, (result) => order.push(sequenceOf(result)));
      }
      transport.respond(0);
      transport.respond(255);
      expect(order).toEqual([]);
      expect(manager.pendingCount).toBe(3);

      transport.respond(254);
      expect(order).toEqual([254, 255, 0]);
      expect(manager.pendingCount).toBe(0);
    });

    it("lets a failure release its successors", () => {
      const outcomes: string[] = [];
      manager.send(echo, (result) =>
        outcomes.push(isOk(result) ? "ok" : unwrapErr(result).message),
      );
      manager.send(echo, (result) =>
        outcomes.push(isOk(result) ? "ok" : unwrapErr(result).message),
      );
      transport.respond(255);
      transport.fail(254, new Error("link lost"));
      expect(outcomes).toEqual(["link lost", "ok"]);
    });

    it("keeps delivering after a callback throws", () => {
      const calls: string[] = [];
      manager.send(echo, () => {
        calls.push("A");
        throw new Error("callback failed");
      });
      manager.send(echo, () => calls.push("B"));
      transport.respond(255);
      expect(() => transport.respond(254)).not.toThrow();
      expect(calls).toEqual(["A", "B"]);
      expect(manager.pendingCount).toBe(0);

      manager.send(echo, () => calls.push("C"));
      transport.respond(0);
      expect(calls).toEqual(["A", "B", "C"]);
    });

    it("resolves request() with a Result", async () => {
      const pending = manager.request(echo);
      transport.respond(254, new Map<string, CborValue>([["r", "hi"]]));
      const result = await pending;
      expect(unwrapOk(result).payload.get("r")).toBe("hi");
    });
  });

  it("delivers every request exactly once in issue order", () => {
    fc.assert(
      fc.property(
        fc.integer({ max: 255, min: 0 }),
        fc
          .integer({ max: 24, min: 1 })
          .chain((count) =>
            fc.tuple(
              fc.shuffledSubarray(
                Array.from({ length: count }, (_, i) => i),
                { maxLength: count, minLength: count },
              ),
              fc.array(fc.boolean(), { maxLength: count, minLength: count }),
            ),
          ),
        (start, [completionOrder, failures]) => {
          const transport = new FakeTransport();
          const manager = new SmpManager(transport, {
            initialSequenceNumber: start,
          });
          const delivered: number[] = [];
          const sequenceNumbers: number[] = [];
          for (let i = 0; i < completionOrder.length; i++) {
            const seq = manager.send(echo, () => delivered.push(i));
            sequenceNumbers.push(seq ?? -1);
          }
          for (const index of completionOrder) {
            const completion = transport.completions[index];
            completion(
              failures[index]
                ? createErr(new Error(`failed ${index}`))
                : createOk(makeResponse(sequenceNumbers[index])),
            );
          }
          expect(delivered).toEqual(completionOrder.map((_, i) => i));
          expect(manager.pendingCount).toBe(0);
        },
      ),
    );
  });

  describe("protocol version", () => {
    let transport: MockTransport;
    let manager: SmpManager;

    beforeEach(async () => {
      transport = new MockTransport({ type: "mock" });
      await transport.connect();
      manager = new SmpManager(transport, { initialSequenceNumber: 0 });
    });

    it("starts at SMPv2", () => {
      manager.send(echo, () => {});
      expect(manager.protocolVersion).toBe(SmpVersion.V2);
      expect(transport.getLastSentData()?.[0]).toBe(1);
    });

    it("follows the version of delivered responses", () => {
      manager.send(echo, () => {});
      transport.respond(0, undefined, { version: 0 });
      expect(manager.protocolVersion).toBe(SmpVersion.V1);

      manager.send(echo, () => {});
      expect(transport.getLastSentData()?.[0]).toBe(0);
      transport.respond(1, undefined, { version: 1 });
      expect(manager.protocolVersion).toBe(SmpVersion.V2);
    });

    it("falls back to SMPv1 for an unknown version byte", () => {
      manager.send(echo, () => {});
      transport.respond(0, undefined, { version: 7 });
      expect(manager.protocolVersion).toBe(SmpVersion.V1);
    });

    it("only updates the version on ordered delivery", () => {
      manager.send(echo, () => {});
      manager.send(echo, () => {});
      transport.respond(1, undefined, { version: 0 });
      expect(manager.protocolVersion).toBe(SmpVersion.V2);
      transport.respond(0, undefined, { version: 1 });
      // Delivered 0 (v2) then 1 (v1); the last delivery wins.
      expect(manager.protocolVersion).toBe(SmpVersion.V1);
    });
  });

  describe("return codes", () => {
    let transport: MockTransport;
    let manager: SmpManager;

    beforeEach(async () => {
      transport = new MockTransport({ type: "mock" });
      await transport.connect();
      manager = new SmpManager(transport, { initialSequenceNumber: 0 });
    });

    it("delivers a non-zero rc as a ReturnCodeError", async () => {
      const pending = manager.request(echo);
      transport.respond(0, new Map([["rc", 2]]));
      const error = unwrapErr(await pending);
      expect(error).toBeInstanceOf(ReturnCodeError);
      expect(error.message).toBe("Remote error: No memory");
    });

    it("resolves group errors through the registry", async () => {
      const pending = manager.request({ ...echo, group: namedGroup("filesystem") });
      const err = new Map<string | number, CborValue>([
        ["group", 8],
        ["rc", 3],
      ]);
      transport.respond(0, new Map<string, CborValue>([["err", err]]));
      const error = unwrapErr(await pending);
      expect(error).toBeInstanceOf(GroupReturnCodeError);
      expect(error.message).toBe(
        "File System group error: File not found (code 3)",
      );
    });

    it("still updates the version for an error response", async () => {
      const pending = manager.request(echo);
      transport.respond(0, new Map([["rc", 8]]), { version: 0 });
      expect(isErr(await pending)).toBe(true);
      expect(manager.protocolVersion).toBe(SmpVersion.V1);
    });
  });

  describe("failures", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("reports a transport timeout in order", async () => {
      vi.useFakeTimers();
      const transport = new MockTransport({ type: "mock" });
      await transport.connect();
      const manager = new SmpManager(transport, { initialSequenceNumber: 10 });
      const results: SmpResult[] = [];
      manager.send({ ...echo, timeoutSeconds: SmpManager.FAST_TIMEOUT }, (r) =>
        results.push(r),
      );
      manager.send(echo, (r) => results.push(r));
      transport.respond(11);
      expect(results).toHaveLength(0);

      vi.advanceTimersByTime(4999);
      expect(results).toHaveLength(0);
      vi.advanceTimersByTime(1);
      expect(results).toHaveLength(2);
      expect(unwrapErr(results[0])).toBeInstanceOf(SmpTimeoutError);
      expect(unwrapErr(results[0]).message).toBe(
        "Request 10 timed out after 5 second(s)",
      );
      expect(sequenceOf(results[1])).toBe(11);
    });

    it("reports a throwing transport as that request's failure", async () => {
      const transport = new MockTransport(
        { type: "mock" },
        { errorMessage: "radio off", shouldFailSend: true },
      );
      await transport.connect();
      const manager = new SmpManager(transport, { initialSequenceNumber: 3 });
      const result = await manager.request(echo);
      expect(unwrapErr(result).message).toBe("radio off");
      expect(manager.nextSequenceNumber).toBe(4);
      expect(manager.pendingCount).toBe(0);
    });

    it("throws RangeError for a command id that does not fit", () => {
      const transport = new FakeTransport();
      const manager = new SmpManager(transport, { initialSequenceNumber: 3 });
      expect(() => manager.send({ ...echo, commandId: 256 }, () => {})).toThrow(
        RangeError,
      );
      expect(manager.nextSequenceNumber).toBe(3);
      expect(transport.sent).toHaveLength(0);
    });

    it("completes a repeated completion with a correlation error", () => {
      const transport = new FakeTransport();
      const manager = new SmpManager(transport, { initialSequenceNumber: 20 });
      const results: SmpResult[] = [];
      manager.send(echo, (r) => results.push(r));
      transport.completions[0](createOk(makeResponse(20)));
      transport.completions[0](createOk(makeResponse(20)));
      expect(results).toHaveLength(2);
      expect(isOk(results[0])).toBe(true);
      expect(unwrapErr(results[1])).toBeInstanceOf(UnknownSequenceError);
    });

    it("handles a transport completing inside send", () => {
      const transport: SmpTransport = {
        scheme: "ble",
        send(data, _timeout, completion) {
          const header = unwrapOk(parseHeader(data));
          completion(createOk(makeResponse(header.sequenceNumber)));
        },
      };
      const manager = new SmpManager(transport, { initialSequenceNumber: 255 });
      const order: number[] = [];
      manager.send(echo, (r) => order.push(sequenceOf(r)));
      manager.send(echo, (r) => order.push(sequenceOf(r)));
      expect(order).toEqual([255, 0]);
    });
  });

  describe("close", () => {
    it("fails pending requests in order and discards late results", async () => {
      const transport = new MockTransport({ type: "mock" });
      await transport.connect();
      const manager = new SmpManager(transport, { initialSequenceNumber: 0 });
      const outcomes: string[] = [];
      const record = (result: SmpResult) =>
        outcomes.push(
          isOk(result) ? `ok ${sequenceOf(result)}` : unwrapErr(result).name,
        );
      manager.send(echo, record);
      manager.send(echo, record);
      manager.send(echo, record);
      transport.respond(1);

      manager.close();
      expect(outcomes).toEqual([
        "ManagerClosedError",
        "ManagerClosedError",
        "ManagerClosedError",
      ]);

      transport.respond(0);
      transport.respond(2);
      expect(outcomes).toHaveLength(3);
      expect(manager.closed).toBe(true);
    });

    it("rejects sends after close", () => {
      const manager = new SmpManager(new FakeTransport());
      manager.close();
      const results: SmpResult[] = [];
      expect(manager.send(echo, (r) => results.push(r))).toBeUndefined();
      expect(results).toHaveLength(1);
      expect(unwrapErr(results[0])).toBeInstanceOf(ManagerClosedError);
    });
  });

  describe("MTU", () => {
    it("defaults by scheme", () => {
      expect(defaultMtu("ble")).toBe(524);
      expect(defaultMtu("udp")).toBe(1024);
      expect(defaultMtu("coap-ble")).toBe(1024);
      expect(defaultMtu("coap-udp")).toBe(1024);
      expect(new SmpManager(new FakeTransport()).mtu).toBe(1024);
    });

    it("guards the valid range", () => {
      const manager = new SmpManager(new FakeTransport(), { mtu: 524 });
      expect(() => manager.setMtu(72)).toThrow(MtuOutOfRangeError);
      expect(() => manager.setMtu(1025)).toThrow(
        "New MTU value 1025 is outside valid range of 73...1024",
      );
      expect(() => manager.setMtu(524)).toThrow(MtuUnchangedError);
      expect(() => manager.setMtu(524)).toThrow("MTU value already set to 524");
      manager.setMtu(500);
      expect(manager.mtu).toBe(500);
      manager.setMtu(73);
      manager.setMtu(1024);
      expect(manager.mtu).toBe(1024);
    });

    it("rejects an out-of-range initial MTU", () => {
      expect(() => new SmpManager(new FakeTransport(), { mtu: 2000 })).toThrow(
        MtuOutOfRangeError,
      );
    });
  });

  describe("logging", () => {
    const records: LogRecord[] = [];

    beforeEach(async () => {
      records.length = 0;
      await configure({
        loggers: [
          {
            category: ["smp-client"],
            lowestLevel: "debug",
            sinks: ["buffer"],
          },
          { category: ["logtape", "meta"], lowestLevel: "warning", sinks: [] },
        ],
        sinks: { buffer: (record) => records.push(record) },
      });
    });

    afterEach(async () => {
      await reset();
    });

    it("logs MTU changes at info", () => {
      const manager = new SmpManager(new FakeTransport());
      manager.setMtu(500);
      const info = records.filter((record) => record.level === "info");
      expect(info).toHaveLength(1);
      expect(info[0].category).toEqual(["smp-client", "manager"]);
      expect(info[0].properties).toEqual({ mtu: 500 });
    });

    it("logs sends at debug and failures at error", () => {
      const transport = new FakeTransport();
      const manager = new SmpManager(transport, { initialSequenceNumber: 1 });
      manager.send(echo, () => {});
      transport.completions[0](createErr(new Error("gone")));
      expect(records.map((record) => record.level)).toEqual(["debug", "error"]);
      expect(records[1].properties).toEqual({
        message: "gone",
        sequenceNumber: 1,
      });
    });

    it("logs a throwing callback at error", () => {
      const transport = new FakeTransport();
      const manager = new SmpManager(transport, { initialSequenceNumber: 1 });
      manager.send(echo, () => {
        throw new Error("callback failed");
      });
      transport.completions[0](createOk(makeResponse(1)));
      expect(records.map((record) => record.level)).toEqual([
        "debug",
        "debug",
        "error",
      ]);
      expect(records[2].properties).toEqual({
        message: "callback failed",
        sequenceNumber: 1,
      });
    });
  });
});
