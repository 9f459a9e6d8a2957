// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

/** Opaque caller key supplied by the identity/wallet layer. */
export type Identity = string;
/** Lowercase hex sha256 digest. */
export type Hash = string;
/** `<scheme>:<value>` reference to immutable bytes held by the content store. */
export type ContentAddress = string;
/** Non-negative integer in the smallest currency unit. */
export type Amount = number;
/** Milliseconds since the epoch. */
export type Timestamp = number;
export type CapabilityTag = string;

export type Visibility = "public" | "private";

export interface FunctionArtifact {
  id: Hash;
  owner: Identity;
  contentRef: ContentAddress;
  dependencies: ContentAddress[];
  visibility: Visibility;
  createdAt: Timestamp;
}

export type NodeStatus = "active" | "suspended" | "slashed";

export interface ComputeNode {
  address: Identity;
  capabilities: CapabilityTag[];
  stake: Amount;
  status: NodeStatus;
  registeredAt: Timestamp;
}

export type TaskStatus = "pending" | "executing" | "completed" | "failed" | "cancelled";

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(["completed", "failed", "cancelled"]);

export interface EscrowHandle {
  handleId: string;
  taskId: Hash;
  payer: Identity;
  amount: Amount;
}

export interface Task {
  id: Hash;
  functionId: Hash;
  submitter: Identity;
  nonce: number;
  reward: Amount;
  status: TaskStatus;
  assignedNode?: Identity;
  attempt: number;
  submittedAt: Timestamp;
  /** Execution window applied on every assignment. */
  executionWindowMs: number;
  deadlineAt: Timestamp;
  resultRef?: ContentAddress;
  completedAt?: Timestamp;
  failureReason?: TaskFailureReason;
  requiredCapabilities: CapabilityTag[];
  dependsOn: Hash[];
  /** Nodes that returned a rejected result for this task. */
  excludedNodes: Identity[];
  escrow: EscrowHandle;
  /** Set once a rejection ends the task; cleared when refund and slash are confirmed. */
  pendingSettlement?: PendingSettlement;
}

export type TaskFailureReason = "attempts_exhausted" | "no_eligible_node" | "dependency_failed";

/**
 * A rejected final attempt whose refund and slash the ledger has not yet
 * confirmed. The slash amount is already taken from the node's stake.
 */
export interface PendingSettlement {
  node: Identity;
  attempt: number;
  reason: TaskFailureReason;
  slashAmount: Amount;
}

export type VerifierKind = "checksum" | "external";

export interface VerificationRecord {
  taskId: Hash;
  attempt: number;
  node: Identity;
  verifierKind: VerifierKind;
  success: boolean;
  detail?: string;
  verifiedAt: Timestamp;
}

export type LedgerOp = "escrow" | "release" | "refund" | "slash";

export type SettlementOp = "release" | "refund";

export interface EscrowSettlement {
  op: SettlementOp;
  to: Identity;
  receipt: LedgerReceipt;
}

export interface LedgerReceipt {
  receiptId: string;
  op: LedgerOp;
  amount: Amount;
  from?: Identity;
  to?: Identity;
  at: Timestamp;
}

export type TaskEventType =
  | "function_registered"
  | "node_registered"
  | "node_status_changed"
  | "stake_deposited"
  | "node_slashed"
  | "task_submitted"
  | "task_assigned"
  | "task_requeued"
  | "task_completed"
  | "task_failed"
  | "task_cancelled"
  | "result_verified";

export interface TaskEvent {
  offset: number;
  type: TaskEventType;
  taskId?: Hash;
  /** Artifact id, node address or task id the event is about. */
  subjectId: string;
  at: Timestamp;
  data: Record<string, string | number | boolean | null>;
  prevHash: string;
  hash: string;
}

export interface SchedulerConfig {
  minReward: Amount;
  maxAttempts: number;
  defaultExecutionWindowMs: number;
  /** Fraction of the task reward slashed from a node whose rejected result fails the task. */
  slashFraction: number;
  excludeFailedNodes: boolean;
}

export type Clock = () => Timestamp;
