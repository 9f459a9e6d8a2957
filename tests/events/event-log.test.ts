import { describe, expect, it } from "vitest";
import type { TaskEvent } from "../../src/common/types.js";
import { EVENT_GENESIS, hashEventPayload, TaskEventLog, verifyEventChain } from "../../src/events/event-log.js";
import { T0 } from "../support/fixtures.js";

function seeded(count: number): TaskEventLog {
  const log = new TaskEventLog(() => T0);
  for (let i = 0; i < count; i += 1) {
    log.append({ type: "node_registered", subjectId: `node-${i}`, data: { capabilities: "" } });
  }
  return log;
}

describe("TaskEventLog", () => {
  it("chains every event to the one before it", () => {
    const log = seeded(3);
    const [first, second, third] = log.read();
    expect(first.offset).toBe(0);
    expect(first.prevHash).toBe(EVENT_GENESIS);
    expect(second.prevHash).toBe(first.hash);
    expect(third.prevHash).toBe(second.hash);
    const { hash, ...unsigned } = third;
    expect(hashEventPayload(unsigned)).toBe(hash);
    expect(verifyEventChain(log.read())).toEqual({ ok: true });
  });

  it("detects tampering", () => {
    const events = seeded(3).read();
    const edited: TaskEvent[] = events.map((e) => ({ ...e, data: { ...e.data } }));
    edited[1].data.capabilities = "gpu";
    expect(verifyEventChain(edited)).toEqual({ ok: false, reason: "hash_mismatch" });

    const reordered = [events[0], { ...events[2], offset: 1 }];
    expect(verifyEventChain(reordered)).toEqual({ ok: false, reason: "invalid_prev_hash" });
    expect(verifyEventChain([events[1]])).toEqual({ ok: false, reason: "invalid_offset" });
  });

  it("pages through events by offset", () => {
    const log = seeded(5);
    expect(log.size).toBe(5);
    expect(log.read(1, 2).map((e) => e.subjectId)).toEqual(["node-1", "node-2"]);
    expect(log.read(4, 10).map((e) => e.offset)).toEqual([4]);
    expect(log.read(9)).toEqual([]);
  });

  it("restores only a valid chain into an empty log", () => {
    const events = seeded(2).read();
    const restored = new TaskEventLog(() => T0);
    restored.restore(events);
    expect(restored.append({ type: "node_registered", subjectId: "node-9" }).prevHash).toBe(events[1].hash);

    expect(() => restored.restore(events)).toThrow("event_log_not_empty");
    const broken = events.map((e) => ({ ...e, hash: "0".repeat(64) }));
    expect(() => new TaskEventLog().restore(broken)).toThrow("event_chain_invalid: hash_mismatch");
  });

  it("streams from an offset and keeps following appends", async () => {
    const log = seeded(2);
    const controller = new AbortController();
    const seen: number[] = [];
    const consumer = (async () => {
      for await (const event of log.stream(1, controller.signal)) {
        seen.push(event.offset);
        if (seen.length === 3) controller.abort();
      }
    })();

    log.append({ type: "node_registered", subjectId: "node-2" });
    log.append({ type: "node_registered", subjectId: "node-3" });
    await consumer;
    expect(seen).toEqual([1, 2, 3]);
  });

  it("waits for the next append once caught up and ends on abort", async () => {
    const log = seeded(0);
    const controller = new AbortController();
    const seen: string[] = [];
    const consumer = (async () => {
      for await (const event of log.stream(0, controller.signal)) {
        seen.push(event.subjectId);
      }
    })();

    await new Promise((resolve) => setImmediate(resolve));
    log.append({ type: "node_registered", subjectId: "late" });
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();
    await consumer;
    expect(seen).toEqual(["late"]);
  });
});
