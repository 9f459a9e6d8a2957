import { describe, expect, it } from "vitest";
import { WebSocket } from "ws";
import { buildCoreServer } from "../../src/api/server.js";
import type { TaskEvent } from "../../src/common/types.js";
import { buildTestCore, CONTENT_A } from "../support/fixtures.js";

describe("event socket", () => {
  it("replays from the requested offset and pushes new events", async () => {
    const { core } = buildTestCore();
    core.registry.register(CONTENT_A, [], "public", "alice");
    core.nodes.registerNode("node-a", []);

    const app = buildCoreServer(core, { operatorToken: "", auth: { maxSkewMs: 1_000, nonceTtlMs: 1_000 } }, { logger: false });
    await app.listen({ host: "127.0.0.1", port: 0 });
    const address = app.server.address();
    if (typeof address !== "object" || address === null) throw new Error("server is not listening");
    const { port } = address;

    const received: TaskEvent[] = [];
    const ws = new WebSocket(`ws://127.0.0.1:${port}/events/stream?offset=1`);
    try {
      await new Promise<void>((resolve, reject) => {
        ws.on("message", (data) => {
          received.push(JSON.parse(data.toString()));
          if (received.length === 1) {
            core.nodes.deposit("node-a", 3);
          }
          if (received.length === 2) resolve();
        });
        ws.on("error", reject);
      });
    } finally {
      ws.close();
      await app.close();
    }

    expect(received.map((e) => [e.offset, e.type])).toEqual([
      [1, "node_registered"],
      [2, "stake_deposited"]
    ]);
  });
});
