// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import type { CoreConfig } from "../common/config.js";
import type { Core } from "../core.js";
import type { NonceStore } from "../security/nonce-verifier.js";
import { attachEventSocket } from "./event-socket.js";
import { registerCoreRoutes } from "./routes.js";

export interface BuildServerOptions {
  logger?: boolean;
  nonceStore?: NonceStore;
}

/** Fastify app with the HTTP routes and the WebSocket event push attached. */
export function buildCoreServer(
  core: Core,
  config: Pick<CoreConfig, "operatorToken" | "auth">,
  options: BuildServerOptions = {}
): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? true });
  registerCoreRoutes(app, core, {
    operatorToken: config.operatorToken,
    maxSkewMs: config.auth.maxSkewMs,
    nonceTtlMs: config.auth.nonceTtlMs,
    nonceStore: options.nonceStore
  });
  attachEventSocket(app, core);
  return app;
}
