// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import type { SchedulerConfig } from "./types.js";

const intFromEnv = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const boolFromEnv = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  CORE_HOST: z.string().default("0.0.0.0"),
  CORE_PORT: intFromEnv(4310),
  CORE_DB_PATH: z.string().optional(),
  CORE_OPERATOR_TOKEN: z.string().default(""),
  MIN_REWARD: intFromEnv(1),
  MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  EXECUTION_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  SLASH_FRACTION: z.coerce.number().min(0).max(1).default(0.1),
  EXCLUDE_FAILED_NODES: boolFromEnv(true),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  DISPATCH_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  LEDGER_MAX_RETRIES: intFromEnv(3),
  LEDGER_RETRY_BASE_DELAY_MS: intFromEnv(200),
  VERIFIER_KIND: z.enum(["checksum", "external"]).default("checksum"),
  EXTERNAL_VERIFIER_URL: z.string().url().optional(),
  EXTERNAL_VERIFIER_TOKEN: z.string().optional(),
  EXTERNAL_VERIFIER_TIMEOUT_MS: intFromEnv(15_000),
  SIGNATURE_MAX_SKEW_MS: intFromEnv(120_000),
  NONCE_TTL_MS: intFromEnv(300_000)
});

export interface CoreConfig {
  host: string;
  port: number;
  dbPath?: string;
  operatorToken: string;
  scheduler: SchedulerConfig;
  sweepIntervalMs: number;
  dispatchIntervalMs: number;
  ledgerRetry: { maxRetries: number; baseDelayMs: number };
  verifier:
    | { kind: "checksum" }
    | { kind: "external"; url: string; token?: string; requestTimeoutMs: number };
  auth: { maxSkewMs: number; nonceTtlMs: number };
}

/** Reads configuration from environment variables; every key has a default except the external verifier URL. */
export function loadCoreConfig(env: NodeJS.ProcessEnv = process.env): CoreConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`invalid_config: ${issue?.path.join(".")}: ${issue?.message}`);
  }
  const e = parsed.data;
  if (e.VERIFIER_KIND === "external" && !e.EXTERNAL_VERIFIER_URL) {
    throw new Error("invalid_config: EXTERNAL_VERIFIER_URL is required when VERIFIER_KIND=external");
  }
  return {
    host: e.CORE_HOST,
    port: e.CORE_PORT,
    dbPath: e.CORE_DB_PATH,
    operatorToken: e.CORE_OPERATOR_TOKEN,
    scheduler: {
      minReward: e.MIN_REWARD,
      maxAttempts: e.MAX_ATTEMPTS,
      defaultExecutionWindowMs: e.EXECUTION_WINDOW_MS,
      slashFraction: e.SLASH_FRACTION,
      excludeFailedNodes: e.EXCLUDE_FAILED_NODES
    },
    sweepIntervalMs: e.SWEEP_INTERVAL_MS,
    dispatchIntervalMs: e.DISPATCH_INTERVAL_MS,
    ledgerRetry: { maxRetries: e.LEDGER_MAX_RETRIES, baseDelayMs: e.LEDGER_RETRY_BASE_DELAY_MS },
    verifier:
      e.VERIFIER_KIND === "external" && e.EXTERNAL_VERIFIER_URL
        ? {
            kind: "external",
            url: e.EXTERNAL_VERIFIER_URL,
            token: e.EXTERNAL_VERIFIER_TOKEN,
            requestTimeoutMs: e.EXTERNAL_VERIFIER_TIMEOUT_MS
          }
        : { kind: "checksum" },
    auth: { maxSkewMs: e.SIGNATURE_MAX_SKEW_MS, nonceTtlMs: e.NONCE_TTL_MS }
  };
}
