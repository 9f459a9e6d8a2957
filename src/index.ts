// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { buildCoreServer } from "./api/server.js";
import { loadCoreConfig } from "./common/config.js";
import { log } from "./common/logger.js";
import { createCore } from "./core.js";
import { SQLiteCoreStore } from "./db/sqlite-store.js";
import { startDispatchLoop, startTimeoutSweeper } from "./scheduler/background.js";
import { InMemoryNonceStore } from "./security/nonce-verifier.js";
import { startPruneScheduler } from "./security/prune-scheduler.js";
import { ExternalProofVerifier } from "./verify/external-verifier.js";
import { ChecksumVerifier } from "./verify/verifier.js";

function isEaddrInUse(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EADDRINUSE";
}

async function main(): Promise<void> {
  const config = loadCoreConfig();
  const store = config.dbPath ? new SQLiteCoreStore(config.dbPath) : undefined;
  const verifier =
    config.verifier.kind === "external"
      ? new ExternalProofVerifier({
          url: config.verifier.url,
          token: config.verifier.token,
          requestTimeoutMs: config.verifier.requestTimeoutMs
        })
      : new ChecksumVerifier();

  const core = createCore({
    store,
    verifier,
    scheduler: config.scheduler,
    retry: config.ledgerRetry
  });

  const nonceStore = new InMemoryNonceStore();
  const app = buildCoreServer(core, config, { nonceStore });
  const sweeper = startTimeoutSweeper(core.scheduler, config.sweepIntervalMs);
  const dispatcher = startDispatchLoop(core.scheduler, config.dispatchIntervalMs);
  const pruner = startPruneScheduler(nonceStore);

  const shutdown = async (signal: string) => {
    log.info("shutting down", { signal });
    sweeper.stop();
    dispatcher.stop();
    clearInterval(pruner);
    await app.close();
    store?.close();
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  try {
    await app.listen({ host: config.host, port: config.port });
  } catch (err) {
    if (isEaddrInUse(err)) {
      log.error(`port ${config.port} is already in use; set CORE_PORT to another port`);
    }
    throw err;
  }
  log.info("compute mesh core listening", {
    host: config.host,
    port: config.port,
    verifier: verifier.kind,
    durable: store !== undefined
  });
}

main().catch((err: unknown) => {
  log.error("fatal", { error: String(err) });
  process.exit(1);
});
