// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { EventSink } from "../events/event-log.js";
import type { LedgerJournal } from "../ledger/in-memory-ledger.js";
import type { ComputeNode, FunctionArtifact, Identity, Task, TaskEvent, VerificationRecord } from "../common/types.js";

export interface CoreSnapshot {
  artifacts: FunctionArtifact[];
  nodes: ComputeNode[];
  tasks: Task[];
  verifications: VerificationRecord[];
  events: TaskEvent[];
  submitterNonces: Array<{ submitter: Identity; nonce: number }>;
}

/**
 * Durable mirror of core state. Components write through after every
 * committed mutation; `load` rehydrates a fresh core at startup. The ledger
 * journal lets a process-local ledger survive restarts beside it.
 */
export interface CoreStore extends EventSink, LedgerJournal {
  saveArtifact(artifact: FunctionArtifact): void;
  saveNode(node: ComputeNode): void;
  saveTask(task: Task): void;
  appendVerification(record: VerificationRecord): void;
  saveSubmitterNonce(submitter: Identity, nonce: number): void;
  load(): CoreSnapshot;
  close(): void;
}
