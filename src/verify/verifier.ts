// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { isSha256Address, safeTokenEqual, sha256Hex } from "../common/crypto-utils.js";
import type { ContentAddress, Hash, Identity, VerifierKind } from "../common/types.js";

export interface VerificationRequest {
  taskId: Hash;
  functionId: Hash;
  contentRef: ContentAddress;
  node: Identity;
  attempt: number;
  resultRef: ContentAddress;
  proof: string;
}

export interface VerificationOutcome {
  success: boolean;
  detail?: string;
}

/**
 * Judges one result. A rejection is an ordinary outcome; throw only when no
 * verdict could be reached.
 */
export interface ResultVerifier {
  readonly kind: VerifierKind;
  verify(request: VerificationRequest): Promise<VerificationOutcome>;
}

/** Checksum a node must present to bind `resultRef` to `taskId`. */
export function computeResultChecksum(taskId: Hash, resultRef: ContentAddress): string {
  return sha256Hex(`${taskId}\n${resultRef}`);
}

export class ChecksumVerifier implements ResultVerifier {
  readonly kind = "checksum" as const;

  async verify(request: VerificationRequest): Promise<VerificationOutcome> {
    if (!isSha256Address(request.resultRef)) {
      return { success: false, detail: "result_ref_not_sha256" };
    }
    if (request.proof.length === 0) {
      return { success: false, detail: "missing_proof" };
    }
    const expected = computeResultChecksum(request.taskId, request.resultRef);
    if (!safeTokenEqual(request.proof.toLowerCase(), expected)) {
      return { success: false, detail: "checksum_mismatch" };
    }
    return { success: true };
  }
}
