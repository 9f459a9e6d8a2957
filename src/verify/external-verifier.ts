// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { request } from "undici";
import { z } from "zod";
import { CoreError } from "../common/errors.js";
import { log } from "../common/logger.js";
import type { ResultVerifier, VerificationOutcome, VerificationRequest } from "./verifier.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ExternalProofVerifierConfig {
  /** Base URL of the proof service; requests go to `${url}/verify`. */
  url: string;
  /** Sent as `x-verifier-token` when set. */
  token?: string;
  /** Per-request timeout in milliseconds. Default: 15 000 */
  requestTimeoutMs?: number;
  /** Retries after the first attempt. Default: 2 */
  maxRetries?: number;
  /** Base delay for exponential backoff in milliseconds. Default: 500 */
  retryBaseDelayMs?: number;
}

const DEFAULTS = {
  requestTimeoutMs: 15_000,
  maxRetries: 2,
  retryBaseDelayMs: 500
} as const;

const verdictSchema = z.object({
  valid: z.boolean(),
  detail: z.string().max(512).optional()
});

// ---------------------------------------------------------------------------
// ExternalProofVerifier
// ---------------------------------------------------------------------------

/**
 * Delegates the verdict to an out-of-process proof system (for example a
 * zero-knowledge verifier). Transport failures and malformed replies are
 * retried, then raised as `verifier_unavailable`; they never count as a
 * rejection.
 */
export class ExternalProofVerifier implements ResultVerifier {
  readonly kind = "external" as const;
  private readonly cfg: Required<Omit<ExternalProofVerifierConfig, "token">> & { token?: string };

  constructor(cfg: ExternalProofVerifierConfig) {
    this.cfg = {
      url: cfg.url.replace(/\/$/, ""),
      token: cfg.token,
      requestTimeoutMs: cfg.requestTimeoutMs ?? DEFAULTS.requestTimeoutMs,
      maxRetries: cfg.maxRetries ?? DEFAULTS.maxRetries,
      retryBaseDelayMs: cfg.retryBaseDelayMs ?? DEFAULTS.retryBaseDelayMs
    };
  }

  async verify(req: VerificationRequest): Promise<VerificationOutcome> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.cfg.token) {
      headers["x-verifier-token"] = this.cfg.token;
    }
    const verdict = await this.withRetry(req.taskId, async () => {
      const res = await request(`${this.cfg.url}/verify`, {
        method: "POST",
        headers,
        body: JSON.stringify({
          taskId: req.taskId,
          functionId: req.functionId,
          contentRef: req.contentRef,
          node: req.node,
          attempt: req.attempt,
          resultRef: req.resultRef,
          proof: req.proof
        }),
        headersTimeout: this.cfg.requestTimeoutMs,
        bodyTimeout: this.cfg.requestTimeoutMs
      });
      if (res.statusCode < 200 || res.statusCode >= 300) {
        const errBody = await res.body.text();
        throw new Error(`proof service responded ${res.statusCode}: ${errBody}`);
      }
      const parsed = verdictSchema.safeParse(await res.body.json());
      if (!parsed.success) {
        throw new Error(`malformed verdict: ${parsed.error.issues[0]?.message ?? "unknown"}`);
      }
      return parsed.data;
    });
    return { success: verdict.valid, detail: verdict.detail };
  }

  private async withRetry<T>(taskId: string, fn: () => Promise<T>): Promise<T> {
    let lastError: Error | undefined;
    for (let attempt = 0; attempt <= this.cfg.maxRetries; attempt++) {
      try {
        return await fn();
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        log.warn("[external-verifier] attempt failed", { taskId, attempt, error: lastError.message });
        if (attempt < this.cfg.maxRetries) {
          const delay = this.cfg.retryBaseDelayMs * Math.pow(2, attempt);
          await new Promise((r) => setTimeout(r, delay));
        }
      }
    }
    throw new CoreError("verifier_unavailable", lastError?.message);
  }
}
