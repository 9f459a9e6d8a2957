// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { Clock, SchedulerConfig, TaskEvent } from "./common/types.js";
import { log } from "./common/logger.js";
import type { CoreStore } from "./db/store.js";
import { TaskEventLog } from "./events/event-log.js";
import { InMemoryLedger } from "./ledger/in-memory-ledger.js";
import type { LedgerAdapter, RetryPolicy, Sleep } from "./ledger/ledger-adapter.js";
import { NodeDirectory } from "./nodes/node-directory.js";
import { FunctionRegistry } from "./registry/function-registry.js";
import { TaskScheduler } from "./scheduler/task-scheduler.js";
import { ResultAggregator } from "./verify/aggregator.js";
import { ChecksumVerifier } from "./verify/verifier.js";
import type { ResultVerifier } from "./verify/verifier.js";

export interface CoreOptions {
  ledger?: LedgerAdapter;
  verifier?: ResultVerifier;
  store?: CoreStore;
  scheduler?: Partial<SchedulerConfig>;
  clock?: Clock;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

export interface Core {
  registry: FunctionRegistry;
  nodes: NodeDirectory;
  scheduler: TaskScheduler;
  aggregator: ResultAggregator;
  events: TaskEventLog;
  ledger: LedgerAdapter;
  verifier: ResultVerifier;
  store?: CoreStore;
  /** Infinite, restartable feed of state changes for read-only subscribers. */
  streamEvents(fromOffset?: number, signal?: AbortSignal): AsyncGenerator<TaskEvent, void, undefined>;
}

/**
 * Wires the components around one set of stores. With a `store`, state is
 * rehydrated before the core is returned and every later commit is mirrored.
 * The default ledger journals into the same store, so escrow handles held by
 * rehydrated tasks stay valid across restarts.
 */
export function createCore(options: CoreOptions = {}): Core {
  const clock = options.clock ?? Date.now;
  const store = options.store;
  const ledger = options.ledger ?? new InMemoryLedger(clock, store);
  const verifier = options.verifier ?? new ChecksumVerifier();
  const events = new TaskEventLog(clock, store);
  const registry = new FunctionRegistry(events, clock, store);
  const nodes = new NodeDirectory(events, clock, store);
  const scheduler = new TaskScheduler({
    registry,
    nodes,
    ledger,
    events,
    config: options.scheduler,
    clock,
    retry: options.retry,
    sleep: options.sleep,
    store
  });
  const aggregator = new ResultAggregator(scheduler, registry, verifier, events, clock, store);

  if (store) {
    const snapshot = store.load();
    events.restore(snapshot.events);
    registry.restore(snapshot.artifacts);
    nodes.restore(snapshot.nodes);
    scheduler.restore(snapshot.tasks, snapshot.submitterNonces);
    aggregator.restore(snapshot.verifications);
    log.info("core state restored", {
      artifacts: snapshot.artifacts.length,
      nodes: snapshot.nodes.length,
      tasks: snapshot.tasks.length,
      events: snapshot.events.length
    });
  }

  return {
    registry,
    nodes,
    scheduler,
    aggregator,
    events,
    ledger,
    verifier,
    store,
    streamEvents: (fromOffset = 0, signal) => events.stream(fromOffset, signal)
  };
}
