// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createHash, timingSafeEqual } from "node:crypto";

export function safeTokenEqual(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

export function sha256Hex(input: string | Buffer): string {
  return createHash("sha256").update(input).digest("hex");
}

const CONTENT_ADDRESS_RE = /^[a-z0-9]+:[A-Za-z0-9._-]+$/;
const SHA256_ADDRESS_RE = /^sha256:[0-9a-f]{64}$/;

export function isContentAddress(value: string): boolean {
  return CONTENT_ADDRESS_RE.test(value);
}

export function isSha256Address(value: string): boolean {
  return SHA256_ADDRESS_RE.test(value);
}
