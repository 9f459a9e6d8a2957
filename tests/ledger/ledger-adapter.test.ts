import { describe, expect, it, vi } from "vitest";
import { CoreError } from "../../src/common/errors.js";
import { withLedgerRetry } from "../../src/ledger/ledger-adapter.js";

describe("withLedgerRetry", () => {
  it("backs off exponentially and returns once the ledger answers", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi
      .fn(async (): Promise<string> => "receipt-1")
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockRejectedValueOnce(new Error("ECONNRESET"));

    await expect(withLedgerRetry("release", fn, { maxRetries: 3, baseDelayMs: 10 }, sleep)).resolves.toBe("receipt-1");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
  });

  it("reports ledger_unavailable after the last retry", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi.fn(async () => {
      throw new Error("timeout");
    });

    await expect(withLedgerRetry("refund", fn, { maxRetries: 2, baseDelayMs: 5 }, sleep)).rejects.toMatchObject({
      code: "ledger_unavailable",
      message: "ledger_unavailable: refund: timeout"
    });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5, 10]);
  });

  it("passes ledger verdicts through without retrying", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi.fn(async () => {
      throw new CoreError("escrow_already_settled", "h-1");
    });

    await expect(withLedgerRetry("release", fn, { maxRetries: 3, baseDelayMs: 5 }, sleep)).rejects.toMatchObject({
      code: "escrow_already_settled"
    });
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
