// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { FastifyInstance } from "fastify";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocket, WebSocketServer } from "ws";
import { log } from "../common/logger.js";
import type { Core } from "../core.js";

export const EVENT_STREAM_PATH = "/events/stream";

function requestedOffset(url: string | undefined): number {
  const parsed = new URL(url ?? "/", "http://localhost");
  const raw = Number(parsed.searchParams.get("offset") ?? "0");
  return Number.isSafeInteger(raw) && raw >= 0 ? raw : 0;
}

async function pump(core: Core, ws: WebSocket, offset: number): Promise<void> {
  const controller = new AbortController();
  ws.on("close", () => controller.abort());
  ws.on("error", (err) => {
    log.warn("event socket error", { error: String(err) });
    controller.abort();
  });
  for await (const event of core.streamEvents(offset, controller.signal)) {
    if (ws.readyState !== WebSocket.OPEN) break;
    ws.send(JSON.stringify(event));
  }
}

/**
 * Pushes every TaskEvent from `?offset=` onward as one JSON text frame.
 * Read-only: inbound frames are ignored.
 */
export function attachEventSocket(app: FastifyInstance, core: Core): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  app.server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    if (pathname !== EVENT_STREAM_PATH) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      pump(core, ws, requestedOffset(req.url)).catch((err: unknown) => {
        log.error("event stream failed", { error: String(err) });
        ws.close(1011, "stream_failed");
      });
    });
  });

  app.addHook("onClose", async () => {
    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  });

  return wss;
}
