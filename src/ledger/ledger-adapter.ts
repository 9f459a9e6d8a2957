// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { CoreError, isCoreError } from "../common/errors.js";
import { log } from "../common/logger.js";
import type { Amount, EscrowHandle, Hash, Identity, LedgerReceipt } from "../common/types.js";

/**
 * Boundary to the chain that holds funds. Every operation must be safe to
 * repeat: escrow per task, release/refund per handle, slash per `opId`.
 */
export interface LedgerAdapter {
  escrow(taskId: Hash, payer: Identity, amount: Amount): Promise<EscrowHandle>;
  release(handle: EscrowHandle, to: Identity): Promise<LedgerReceipt>;
  refund(handle: EscrowHandle): Promise<LedgerReceipt>;
  slash(node: Identity, amount: Amount, opId: string): Promise<LedgerReceipt>;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxRetries: 3, baseDelayMs: 200 };

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retries transport failures with exponential backoff. CoreErrors are
 * verdicts from the ledger and propagate at once. Exhaustion surfaces as
 * `ledger_unavailable`.
 */
export async function withLedgerRetry<T>(
  op: string,
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  sleep: Sleep = realSleep
): Promise<T> {
  let lastError: Error | undefined;
  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (isCoreError(err)) throw err;
      lastError = err instanceof Error ? err : new Error(String(err));
      log.warn("ledger operation failed", { op, attempt, error: lastError.message });
      if (attempt < policy.maxRetries) {
        await sleep(policy.baseDelayMs * Math.pow(2, attempt));
      }
    }
  }
  log.error("ledger unavailable", { op, error: lastError?.message });
  throw new CoreError("ledger_unavailable", `${op}: ${lastError?.message ?? "unknown"}`);
}
