import { describe, expect, it } from "vitest";
import { loadCoreConfig } from "../../src/common/config.js";

describe("loadCoreConfig", () => {
  it("falls back to defaults for every unset key", () => {
    expect(loadCoreConfig({})).toEqual({
      host: "0.0.0.0",
      port: 4310,
      dbPath: undefined,
      operatorToken: "",
      scheduler: {
        minReward: 1,
        maxAttempts: 3,
        defaultExecutionWindowMs: 60_000,
        slashFraction: 0.1,
        excludeFailedNodes: true
      },
      sweepIntervalMs: 5_000,
      dispatchIntervalMs: 1_000,
      ledgerRetry: { maxRetries: 3, baseDelayMs: 200 },
      verifier: { kind: "checksum" },
      auth: { maxSkewMs: 120_000, nonceTtlMs: 300_000 }
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadCoreConfig({
      CORE_PORT: "8080",
      CORE_DB_PATH: "/var/lib/mesh/core.db",
      MAX_ATTEMPTS: "5",
      SLASH_FRACTION: "0.25",
      EXCLUDE_FAILED_NODES: "0",
      VERIFIER_KIND: "external",
      EXTERNAL_VERIFIER_URL: "http://127.0.0.1:9000",
      EXTERNAL_VERIFIER_TOKEN: "test-verifier-token"
    });
    expect(config.port).toBe(8080);
    expect(config.dbPath).toBe("/var/lib/mesh/core.db");
    expect(config.scheduler).toMatchObject({ maxAttempts: 5, slashFraction: 0.25, excludeFailedNodes: false });
    expect(config.verifier).toEqual({
      kind: "external",
      url: "http://127.0.0.1:9000",
      token: "test-verifier-token",
      requestTimeoutMs: 15_000
    });
  });

  it("requires a URL for the external verifier", () => {
    expect(() => loadCoreConfig({ VERIFIER_KIND: "external" })).toThrow(
      "invalid_config: EXTERNAL_VERIFIER_URL is required when VERIFIER_KIND=external"
    );
  });

  it("rejects malformed values", () => {
    expect(() => loadCoreConfig({ SLASH_FRACTION: "2" })).toThrow(/^invalid_config: SLASH_FRACTION/);
    expect(() => loadCoreConfig({ MAX_ATTEMPTS: "0" })).toThrow(/^invalid_config: MAX_ATTEMPTS/);
  });
});
