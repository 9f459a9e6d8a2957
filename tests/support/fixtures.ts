import { sha256Hex } from "../../src/common/crypto-utils.js";
import { isCoreError } from "../../src/common/errors.js";
import type { SchedulerConfig } from "../../src/common/types.js";
import { createCore } from "../../src/core.js";
import type { Core } from "../../src/core.js";
import type { CoreStore } from "../../src/db/store.js";
import { InMemoryLedger } from "../../src/ledger/in-memory-ledger.js";
import type { Sleep } from "../../src/ledger/ledger-adapter.js";
import { computeResultChecksum } from "../../src/verify/verifier.js";
import type { ResultVerifier } from "../../src/verify/verifier.js";

export const T0 = 1_700_000_000_000;

export const CONTENT_A = `sha256:${"a".repeat(64)}`;
export const CONTENT_B = `sha256:${"b".repeat(64)}`;

export const noSleep: Sleep = async () => undefined;

export interface ManualClock {
  now(): number;
  advance(ms: number): void;
}

export function manualClock(start = T0): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    }
  };
}

export interface TestCore {
  core: Core;
  ledger: InMemoryLedger;
  time: ManualClock;
}

export function buildTestCore(
  options: {
    scheduler?: Partial<SchedulerConfig>;
    verifier?: ResultVerifier;
    ledger?: InMemoryLedger;
    store?: CoreStore;
    time?: ManualClock;
    maxRetries?: number;
  } = {}
): TestCore {
  const time = options.time ?? manualClock();
  const ledger = options.ledger ?? new InMemoryLedger(time.now);
  const core = createCore({
    ledger,
    verifier: options.verifier,
    store: options.store,
    scheduler: options.scheduler,
    clock: time.now,
    retry: { maxRetries: options.maxRetries ?? 2, baseDelayMs: 1 },
    sleep: noSleep
  });
  return { core, ledger, time };
}

/** Registers a node with `stake` deposited and the given capabilities. */
export function stakedNode(core: Core, address: string, stake: number, capabilities: string[] = []): void {
  core.nodes.registerNode(address, capabilities);
  if (stake > 0) core.nodes.deposit(address, stake);
}

/** A result reference and the checksum proof the baseline verifier accepts for it. */
export function validResult(taskId: string, seed = "output"): { resultRef: string; proof: string } {
  const resultRef = `sha256:${sha256Hex(seed)}`;
  return { resultRef, proof: computeResultChecksum(taskId, resultRef) };
}

export function badResult(seed = "output"): { resultRef: string; proof: string } {
  return { resultRef: `sha256:${sha256Hex(seed)}`, proof: "0".repeat(64) };
}

/** Error code thrown by `fn`, or undefined when it returns normally. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isCoreError(err) ? err.code : String(err);
  }
  return undefined;
}
