// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export interface NonceStore {
  exists(nonce: string): Promise<boolean>;
  insert(nonce: string, sourceId: string, expiresAtMs: number): Promise<void>;
  prune(): Promise<number>;
}

export interface NonceCheckParams {
  nonce: string;
  sourceId: string;
  timestampMs: number;
  maxSkewMs: number;
  ttlMs?: number;
  nowMs?: number;
}

export interface NonceCheckResult {
  valid: boolean;
  reason?: "replay" | "timestamp_skew";
}

const DEFAULT_TTL_MS = 5 * 60_000; // 5 minutes

export async function verifyNonce(
  store: NonceStore,
  params: NonceCheckParams
): Promise<NonceCheckResult> {
  const { nonce, sourceId, timestampMs, maxSkewMs, ttlMs = DEFAULT_TTL_MS } = params;
  const now = params.nowMs ?? Date.now();
  const skew = Math.abs(now - timestampMs);

  if (skew > maxSkewMs) {
    return { valid: false, reason: "timestamp_skew" };
  }

  // Nonces are scoped per identity so two callers can never collide.
  const key = `${sourceId}:${nonce}`;
  if (await store.exists(key)) {
    return { valid: false, reason: "replay" };
  }

  await store.insert(key, sourceId, now + ttlMs);
  return { valid: true };
}

/** Process-local nonce store; entries live until `prune` passes their expiry. */
export class InMemoryNonceStore implements NonceStore {
  private entries = new Map<string, { sourceId: string; expiresAtMs: number }>();

  constructor(private readonly clock: () => number = Date.now) {}

  async exists(nonce: string): Promise<boolean> {
    return this.entries.has(nonce);
  }

  async insert(nonce: string, sourceId: string, expiresAtMs: number): Promise<void> {
    this.entries.set(nonce, { sourceId, expiresAtMs });
  }

  async prune(): Promise<number> {
    const now = this.clock();
    let removed = 0;
    for (const [nonce, entry] of this.entries) {
      if (entry.expiresAtMs < now) {
        this.entries.delete(nonce);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
