// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type CoreErrorCode =
  | "not_found"
  | "duplicate_artifact"
  | "unknown_node"
  | "unknown_function"
  | "insufficient_reward"
  | "not_assigned"
  | "stale_attempt"
  | "invalid_transition"
  | "invalid_input"
  | "not_authorized"
  | "escrow_already_settled"
  | "ledger_unavailable"
  | "verifier_unavailable";

/** Recoverable, caller-facing failure. Verification rejections are not errors. */
export class CoreError extends Error {
  constructor(
    readonly code: CoreErrorCode,
    detail?: string
  ) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = "CoreError";
  }
}

export function isCoreError(err: unknown, code?: CoreErrorCode): err is CoreError {
  return err instanceof CoreError && (code === undefined || err.code === code);
}

const HTTP_STATUS: Record<CoreErrorCode, number> = {
  invalid_input: 400,
  insufficient_reward: 400,
  not_authorized: 403,
  not_assigned: 403,
  not_found: 404,
  unknown_node: 404,
  unknown_function: 404,
  duplicate_artifact: 409,
  stale_attempt: 409,
  invalid_transition: 409,
  escrow_already_settled: 409,
  ledger_unavailable: 503,
  verifier_unavailable: 503
};

export function httpStatusFor(code: CoreErrorCode): number {
  return HTTP_STATUS[code];
}
