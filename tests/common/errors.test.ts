import { describe, expect, it } from "vitest";
import { CoreError, httpStatusFor, isCoreError } from "../../src/common/errors.js";

describe("CoreError", () => {
  it("prefixes the message with the code", () => {
    expect(new CoreError("not_found", "task t-1").message).toBe("not_found: task t-1");
    expect(new CoreError("stale_attempt").message).toBe("stale_attempt");
  });

  it("narrows by code", () => {
    const err: unknown = new CoreError("ledger_unavailable", "refund");
    expect(isCoreError(err)).toBe(true);
    expect(isCoreError(err, "ledger_unavailable")).toBe(true);
    expect(isCoreError(err, "not_found")).toBe(false);
    expect(isCoreError(new Error("ledger_unavailable"))).toBe(false);
  });

  it("maps codes to HTTP statuses", () => {
    expect(httpStatusFor("insufficient_reward")).toBe(400);
    expect(httpStatusFor("not_assigned")).toBe(403);
    expect(httpStatusFor("unknown_function")).toBe(404);
    expect(httpStatusFor("stale_attempt")).toBe(409);
    expect(httpStatusFor("verifier_unavailable")).toBe(503);
  });
});
