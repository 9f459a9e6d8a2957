import { describe, expect, it, vi } from "vitest";
import { startDispatchLoop, startTimeoutSweeper } from "../../src/scheduler/background.js";
import type { Assignment } from "../../src/scheduler/task-scheduler.js";
import { badResult, buildTestCore, CONTENT_A, stakedNode } from "../support/fixtures.js";

describe("background loops", () => {
  it("dispatches every assignable task on each tick", async () => {
    const { core } = buildTestCore();
    const fn = core.registry.register(CONTENT_A, [], "public", "alice");
    stakedNode(core, "node-a", 10);
    const first = await core.scheduler.submit({ functionId: fn.id, submitter: "alice", reward: 5 });
    const second = await core.scheduler.submit({ functionId: fn.id, submitter: "bob", reward: 5 });

    const assigned: Assignment[] = [];
    const loop = startDispatchLoop(core.scheduler, 5, (a) => assigned.push(a));
    try {
      await vi.waitFor(() => expect(assigned).toHaveLength(2));
    } finally {
      loop.stop();
    }
    expect(assigned.map((a) => a.task.id).sort()).toEqual([first.id, second.id].sort());
    expect(assigned.every((a) => a.node.address === "node-a")).toBe(true);
  });

  it("requeues overdue tasks and fails orphaned dependents", async () => {
    const { core, time } = buildTestCore({ scheduler: { defaultExecutionWindowMs: 1_000 } });
    const fn = core.registry.register(CONTENT_A, [], "public", "alice");
    stakedNode(core, "node-a", 10);
    const running = await core.scheduler.submit({ functionId: fn.id, submitter: "alice", reward: 5 });
    const parent = await core.scheduler.submit({
      functionId: fn.id,
      submitter: "bob",
      reward: 5,
      requiredCapabilities: ["gpu"]
    });
    const child = await core.scheduler.submit({ functionId: fn.id, submitter: "bob", reward: 5, dependsOn: [parent.id] });
    core.scheduler.assign();
    await core.scheduler.cancel(parent.id, "bob");
    time.advance(1_001);

    const loop = startTimeoutSweeper(core.scheduler, 5);
    try {
      await vi.waitFor(() => {
        expect(core.scheduler.getTask(running.id).status).toBe("pending");
        expect(core.scheduler.getTask(child.id).status).toBe("failed");
      });
    } finally {
      loop.stop();
    }
    expect(core.scheduler.getTask(child.id).failureReason).toBe("dependency_failed");
  });

  it("finishes a rejection the ledger could not settle at first", async () => {
    const { core, ledger } = buildTestCore({ scheduler: { maxAttempts: 1 } });
    const fn = core.registry.register(CONTENT_A, [], "public", "alice");
    stakedNode(core, "node-a", 10);
    const task = await core.scheduler.submit({ functionId: fn.id, submitter: "alice", reward: 50 });
    core.scheduler.assign();
    ledger.failNext("refund", 3);
    await expect(
      core.aggregator.submitResult({ taskId: task.id, node: "node-a", ...badResult() })
    ).rejects.toMatchObject({ code: "ledger_unavailable" });

    const loop = startTimeoutSweeper(core.scheduler, 5);
    try {
      await vi.waitFor(() => expect(core.scheduler.getTask(task.id).status).toBe("failed"));
    } finally {
      loop.stop();
    }
    expect(ledger.settlementOf(task.id)).toEqual({ op: "refund", to: "alice" });
    expect(ledger.receiptsFor("slash").map((r) => r.amount)).toEqual([5]);
  });
});
