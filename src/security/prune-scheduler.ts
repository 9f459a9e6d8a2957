// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { log } from "../common/logger.js";

export interface PrunableStore {
  prune(): Promise<number>;
}

export function startPruneScheduler(
  store: PrunableStore,
  intervalMs: number = 5 * 60_000
): NodeJS.Timeout {
  const timer = setInterval(() => {
    store
      .prune()
      .then((removed) => {
        if (removed > 0) log.info("pruned expired nonces", { removed });
      })
      .catch((err: unknown) => log.error("nonce prune failed", { error: String(err) }));
  }, intervalMs);
  timer.unref();
  return timer;
}
