import { describe, expect, it } from "vitest";
import { sha256Hex } from "../../src/common/crypto-utils.js";
import { ChecksumVerifier, computeResultChecksum } from "../../src/verify/verifier.js";
import type { VerificationRequest } from "../../src/verify/verifier.js";

const TASK_ID = sha256Hex("task");
const RESULT_REF = `sha256:${sha256Hex("result")}`;

function request(overrides: Partial<VerificationRequest> = {}): VerificationRequest {
  return {
    taskId: TASK_ID,
    functionId: sha256Hex("function"),
    contentRef: `sha256:${"a".repeat(64)}`,
    node: "node-a",
    attempt: 1,
    resultRef: RESULT_REF,
    proof: computeResultChecksum(TASK_ID, RESULT_REF),
    ...overrides
  };
}

describe("ChecksumVerifier", () => {
  const verifier = new ChecksumVerifier();

  it("binds the proof to the task and result", () => {
    expect(computeResultChecksum(TASK_ID, RESULT_REF)).toBe(sha256Hex(`${TASK_ID}\n${RESULT_REF}`));
  });

  it("accepts the matching checksum in either case", async () => {
    expect(await verifier.verify(request())).toEqual({ success: true });
    const upper = computeResultChecksum(TASK_ID, RESULT_REF).toUpperCase();
    expect(await verifier.verify(request({ proof: upper }))).toEqual({ success: true });
  });

  it("rejects result references that are not sha256 addresses", async () => {
    expect(await verifier.verify(request({ resultRef: "ipfs:bafy123" }))).toEqual({
      success: false,
      detail: "result_ref_not_sha256"
    });
  });

  it("rejects an empty proof", async () => {
    expect(await verifier.verify(request({ proof: "" }))).toEqual({ success: false, detail: "missing_proof" });
  });

  it("rejects a checksum computed for another task", async () => {
    const foreign = computeResultChecksum(sha256Hex("other-task"), RESULT_REF);
    expect(await verifier.verify(request({ proof: foreign }))).toEqual({ success: false, detail: "checksum_mismatch" });
  });
});
