import { describe, expect, it } from "vitest";
import { TaskEventLog } from "../../src/events/event-log.js";
import { NodeDirectory } from "../../src/nodes/node-directory.js";
import { codeOf, T0 } from "../support/fixtures.js";

function makeDirectory() {
  const events = new TaskEventLog(() => T0);
  return { events, nodes: new NodeDirectory(events, () => T0) };
}

describe("NodeDirectory", () => {
  it("registers nodes active with zero stake and sorted, unique capabilities", () => {
    const { nodes } = makeDirectory();
    const node = nodes.registerNode("node-a", ["gpu", "cpu", "gpu"]);
    expect(node).toEqual({ address: "node-a", capabilities: ["cpu", "gpu"], stake: 0, status: "active", registeredAt: T0 });
  });

  it("keeps stake and status when a node re-registers", () => {
    const { nodes } = makeDirectory();
    nodes.registerNode("node-a", ["cpu"]);
    nodes.deposit("node-a", 50);
    const again = nodes.registerNode("node-a", ["gpu"]);
    expect(again.stake).toBe(50);
    expect(again.capabilities).toEqual(["gpu"]);
  });

  it("accepts only positive integer deposits for known nodes", () => {
    const { nodes } = makeDirectory();
    expect(codeOf(() => nodes.deposit("ghost", 10))).toBe("unknown_node");
    nodes.registerNode("node-a", []);
    expect(codeOf(() => nodes.deposit("node-a", 0))).toBe("invalid_input");
    expect(codeOf(() => nodes.deposit("node-a", 1.5))).toBe("invalid_input");
    expect(nodes.deposit("node-a", 7).stake).toBe(7);
  });

  it("only counts active, staked nodes with every required capability as eligible", () => {
    const { nodes } = makeDirectory();
    nodes.registerNode("unstaked", ["gpu"]);
    nodes.registerNode("cpu-only", ["cpu"]);
    nodes.deposit("cpu-only", 5);
    nodes.registerNode("full", ["cpu", "gpu"]);
    nodes.deposit("full", 5);
    nodes.registerNode("paused", ["cpu", "gpu"]);
    nodes.deposit("paused", 5);
    nodes.suspend("paused");

    expect([...nodes.eligibleNodes(["gpu"])]).toEqual(["full"]);
    expect([...nodes.eligibleNodes([])]).toEqual(["cpu-only", "full"]);
  });

  it("ranks candidates by stake, then address, minus exclusions", () => {
    const { nodes } = makeDirectory();
    for (const [address, stake] of [["node-c", 10], ["node-b", 20], ["node-a", 10]] as const) {
      nodes.registerNode(address, []);
      nodes.deposit(address, stake);
    }
    expect(nodes.rankedCandidates([]).map((n) => n.address)).toEqual(["node-b", "node-a", "node-c"]);
    expect(nodes.rankedCandidates([], ["node-b"]).map((n) => n.address)).toEqual(["node-a", "node-c"]);
  });

  it("never slashes below zero and marks drained nodes slashed", () => {
    const { nodes, events } = makeDirectory();
    nodes.registerNode("node-a", []);
    nodes.deposit("node-a", 10);
    expect(nodes.slash("node-a", 4)).toMatchObject({ stake: 6, status: "active" });
    expect(nodes.slash("node-a", 100)).toMatchObject({ stake: 0, status: "slashed" });
    expect(events.read().at(-1)?.data).toEqual({ amount: 6, stake: 0, status: "slashed" });
    expect(nodes.eligibleNodes([]).size).toBe(0);
  });

  it("reactivates a slashed node when a deposit restores its stake", () => {
    const { nodes } = makeDirectory();
    nodes.registerNode("node-a", []);
    nodes.deposit("node-a", 3);
    nodes.slash("node-a", 3);
    expect(nodes.deposit("node-a", 2)).toMatchObject({ stake: 2, status: "active" });
  });

  it("suspends and reinstates active nodes", () => {
    const { nodes, events } = makeDirectory();
    nodes.registerNode("node-a", []);
    nodes.deposit("node-a", 3);
    expect(nodes.suspend("node-a").status).toBe("suspended");
    expect(codeOf(() => nodes.suspend("node-a"))).toBe("invalid_transition");
    expect(nodes.reinstate("node-a").status).toBe("active");
    expect(codeOf(() => nodes.reinstate("node-a"))).toBe("invalid_transition");
    expect(events.read().filter((e) => e.type === "node_status_changed").map((e) => e.data)).toEqual([
      { from: "active", to: "suspended" },
      { from: "suspended", to: "active" }
    ]);
  });
});
