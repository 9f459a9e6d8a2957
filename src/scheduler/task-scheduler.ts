// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { CoreError } from "../common/errors.js";
import { sha256Hex } from "../common/crypto-utils.js";
import { KeyedMutex } from "../common/keyed-mutex.js";
import { log } from "../common/logger.js";
import { TERMINAL_STATUSES } from "../common/types.js";
import type {
  Amount,
  CapabilityTag,
  Clock,
  ComputeNode,
  ContentAddress,
  Hash,
  Identity,
  PendingSettlement,
  SchedulerConfig,
  Task,
  TaskFailureReason,
  TaskStatus
} from "../common/types.js";
import type { CoreStore } from "../db/store.js";
import { TaskEventLog } from "../events/event-log.js";
import { DEFAULT_RETRY_POLICY, realSleep, withLedgerRetry } from "../ledger/ledger-adapter.js";
import type { LedgerAdapter, RetryPolicy, Sleep } from "../ledger/ledger-adapter.js";
import { NodeDirectory } from "../nodes/node-directory.js";
import { FunctionRegistry } from "../registry/function-registry.js";

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  minReward: 1,
  maxAttempts: 3,
  defaultExecutionWindowMs: 60_000,
  slashFraction: 0.1,
  excludeFailedNodes: true
};

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["executing", "failed", "cancelled"],
  executing: ["pending", "completed", "failed"],
  completed: [],
  failed: [],
  cancelled: []
};

export function deriveTaskId(functionId: Hash, submitter: Identity, nonce: number): Hash {
  return sha256Hex(`${functionId}\n${submitter}\n${nonce}`);
}

export interface SubmitTaskInput {
  functionId: Hash;
  submitter: Identity;
  reward: Amount;
  executionWindowMs?: number;
  requiredCapabilities?: CapabilityTag[];
  dependsOn?: Hash[];
}

export interface Assignment {
  task: Task;
  node: ComputeNode;
}

export interface TaskFilter {
  status?: TaskStatus;
  submitter?: Identity;
  node?: Identity;
}

export interface TaskSchedulerDeps {
  registry: FunctionRegistry;
  nodes: NodeDirectory;
  ledger: LedgerAdapter;
  events: TaskEventLog;
  config?: Partial<SchedulerConfig>;
  clock?: Clock;
  retry?: RetryPolicy;
  sleep?: Sleep;
  store?: CoreStore;
}

function copyTask(task: Task): Task {
  return {
    ...task,
    requiredCapabilities: [...task.requiredCapabilities],
    dependsOn: [...task.dependsOn],
    excludedNodes: [...task.excludedNodes],
    escrow: { ...task.escrow },
    pendingSettlement: task.pendingSettlement ? { ...task.pendingSettlement } : undefined
  };
}

function compareTasks(a: Task, b: Task): number {
  if (a.submittedAt !== b.submittedAt) return a.submittedAt - b.submittedAt;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Owns the task state machine:
 *
 *   pending -> executing -> completed | failed
 *   executing -> pending            (timeout or rejected result, attempts left)
 *   pending -> failed | cancelled
 *
 * Terminal transitions that move funds commit only after the ledger confirms
 * every operation they need. While those operations are in flight the task is
 * "settling" and `assign()` skips it. A rejection that ends the task is
 * recorded as a `pendingSettlement` first, so a ledger outage leaves it
 * closed to further results until `settlePendingRejections` finishes it.
 */
export class TaskScheduler {
  readonly config: SchedulerConfig;
  private readonly tasks = new Map<Hash, Task>();
  private readonly nonces = new Map<Identity, number>();
  private readonly settling = new Set<Hash>();
  private readonly locks = new KeyedMutex();
  private readonly registry: FunctionRegistry;
  private readonly nodes: NodeDirectory;
  private readonly ledger: LedgerAdapter;
  private readonly events: TaskEventLog;
  private readonly clock: Clock;
  private readonly retry: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly store?: CoreStore;

  constructor(deps: TaskSchedulerDeps) {
    this.registry = deps.registry;
    this.nodes = deps.nodes;
    this.ledger = deps.ledger;
    this.events = deps.events;
    this.clock = deps.clock ?? Date.now;
    this.retry = deps.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = deps.sleep ?? realSleep;
    this.store = deps.store;
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...deps.config };
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new CoreError("invalid_input", "maxAttempts must be a positive integer");
    }
    if (this.config.slashFraction < 0 || this.config.slashFraction > 1) {
      throw new CoreError("invalid_input", "slashFraction must be within [0, 1]");
    }
  }

  async submit(input: SubmitTaskInput): Promise<Task> {
    if (!this.registry.has(input.functionId)) {
      throw new CoreError("unknown_function", input.functionId);
    }
    const artifact = this.registry.get(input.functionId);
    if (artifact.visibility === "private" && artifact.owner !== input.submitter) {
      throw new CoreError("unknown_function", input.functionId);
    }
    if (!Number.isSafeInteger(input.reward) || input.reward < 0) {
      throw new CoreError("invalid_input", `reward must be a non-negative integer, got ${input.reward}`);
    }
    if (input.reward < this.config.minReward) {
      throw new CoreError("insufficient_reward", `${input.reward} < ${this.config.minReward}`);
    }
    const executionWindowMs = input.executionWindowMs ?? this.config.defaultExecutionWindowMs;
    if (!Number.isSafeInteger(executionWindowMs) || executionWindowMs <= 0) {
      throw new CoreError("invalid_input", "executionWindowMs must be a positive integer");
    }
    const dependsOn = [...new Set(input.dependsOn ?? [])];
    const missing = dependsOn.find((dep) => !this.tasks.has(dep));
    if (missing !== undefined) {
      throw new CoreError("not_found", `dependency ${missing}`);
    }

    // Reserve the nonce before awaiting so concurrent submits never share an id.
    const nonce = (this.nonces.get(input.submitter) ?? 0) + 1;
    this.nonces.set(input.submitter, nonce);
    this.store?.saveSubmitterNonce(input.submitter, nonce);
    const id = deriveTaskId(input.functionId, input.submitter, nonce);

    const escrow = await withLedgerRetry(
      "escrow",
      () => this.ledger.escrow(id, input.submitter, input.reward),
      this.retry,
      this.sleep
    );

    const submittedAt = this.clock();
    const task: Task = {
      id,
      functionId: input.functionId,
      submitter: input.submitter,
      nonce,
      reward: input.reward,
      status: "pending",
      attempt: 0,
      submittedAt,
      executionWindowMs,
      deadlineAt: submittedAt + executionWindowMs,
      requiredCapabilities: [...new Set(input.requiredCapabilities ?? [])].sort(),
      dependsOn,
      excludedNodes: [],
      escrow
    };
    this.tasks.set(id, task);
    this.store?.saveTask(task);
    this.events.append({
      type: "task_submitted",
      taskId: id,
      subjectId: id,
      data: { functionId: task.functionId, submitter: task.submitter, reward: task.reward }
    });
    return copyTask(task);
  }

  /**
   * Moves the oldest assignable pending task to the highest-staked eligible
   * node. Never waits; `undefined` means there was nothing to hand out.
   */
  assign(): Assignment | undefined {
    const pending = [...this.tasks.values()].filter((task) => task.status === "pending").sort(compareTasks);
    for (const task of pending) {
      if (this.settling.has(task.id) || !this.dependenciesMet(task)) continue;
      const [node] = this.nodes.rankedCandidates(task.requiredCapabilities, task.excludedNodes);
      if (!node) continue;

      const now = this.clock();
      this.transition(task, "pending", "executing");
      task.assignedNode = node.address;
      task.attempt += 1;
      task.deadlineAt = now + task.executionWindowMs;
      this.store?.saveTask(task);
      this.events.append({
        type: "task_assigned",
        taskId: task.id,
        subjectId: task.id,
        data: { node: node.address, attempt: task.attempt, deadlineAt: task.deadlineAt }
      });
      return { task: copyTask(task), node };
    }
    return undefined;
  }

  /** No-op unless the task is executing past its deadline. */
  async reportTimeout(taskId: Hash): Promise<Task> {
    return this.locks.run(taskId, async () => {
      const task = this.require(taskId);
      if (task.pendingSettlement) {
        await this.finishRejection(task, task.pendingSettlement);
        return copyTask(task);
      }
      if (task.status !== "executing" || this.clock() <= task.deadlineAt) {
        return copyTask(task);
      }
      if (task.attempt < this.config.maxAttempts) {
        this.requeue(task, "timeout");
        return copyTask(task);
      }
      await this.refundAndFail(task, "attempts_exhausted");
      return copyTask(task);
    });
  }

  async cancel(taskId: Hash, caller: Identity): Promise<Task> {
    return this.locks.run(taskId, async () => {
      const task = this.require(taskId);
      if (task.submitter !== caller) {
        throw new CoreError("not_authorized", `only the submitter may cancel ${taskId}`);
      }
      if (task.status !== "pending") {
        throw new CoreError("invalid_transition", `cannot cancel a ${task.status} task`);
      }
      await this.settle(task, [() => this.ledger.refund(task.escrow)], "refund");
      this.transition(task, "pending", "cancelled");
      this.store?.saveTask(task);
      this.events.append({
        type: "task_cancelled",
        taskId: task.id,
        subjectId: task.id,
        data: { refundTo: task.submitter, amount: task.reward }
      });
      return copyTask(task);
    });
  }

  /** Applies `reportTimeout` to every overdue task; returns how many changed state. */
  async sweepTimeouts(): Promise<number> {
    const now = this.clock();
    const overdue = [...this.tasks.values()].filter((t) => t.status === "executing" && now > t.deadlineAt);
    let changed = 0;
    for (const candidate of overdue) {
      try {
        const after = await this.reportTimeout(candidate.id);
        if (after.status !== "executing") changed += 1;
      } catch (err) {
        log.error("timeout sweep failed", { taskId: candidate.id, error: String(err) });
      }
    }
    return changed;
  }

  /** Retries refund and slash for rejected tasks left unsettled by a ledger outage. */
  async settlePendingRejections(): Promise<number> {
    const unsettled = [...this.tasks.values()].filter((t) => t.pendingSettlement !== undefined);
    let settled = 0;
    for (const candidate of unsettled) {
      try {
        await this.locks.run(candidate.id, async () => {
          const task = this.require(candidate.id);
          if (!task.pendingSettlement) return;
          await this.finishRejection(task, task.pendingSettlement);
          settled += 1;
        });
      } catch (err) {
        log.error("settlement retry failed", { taskId: candidate.id, error: String(err) });
      }
    }
    return settled;
  }

  /** Fails pending tasks whose dependencies can no longer complete. Cascades through chains. */
  async failBlockedTasks(): Promise<number> {
    let total = 0;
    for (;;) {
      const blocked = [...this.tasks.values()].filter((t) => t.status === "pending" && this.dependencyDead(t));
      let changed = 0;
      for (const candidate of blocked) {
        try {
          await this.locks.run(candidate.id, async () => {
            const task = this.require(candidate.id);
            if (task.status !== "pending" || !this.dependencyDead(task)) return;
            await this.refundAndFail(task, "dependency_failed");
            changed += 1;
          });
        } catch (err) {
          log.error("dependency sweep failed", { taskId: candidate.id, error: String(err) });
        }
      }
      total += changed;
      if (changed === 0) return total;
    }
  }

  getTask(taskId: Hash): Task {
    return copyTask(this.require(taskId));
  }

  listTasks(filter: TaskFilter = {}): Task[] {
    return [...this.tasks.values()]
      .filter((task) => filter.status === undefined || task.status === filter.status)
      .filter((task) => filter.submitter === undefined || task.submitter === filter.submitter)
      .filter((task) => filter.node === undefined || task.assignedNode === filter.node)
      .sort(compareTasks)
      .map(copyTask);
  }

  isSettling(taskId: Hash): boolean {
    return this.settling.has(taskId);
  }

  /** Serializes result intake, timeouts and cancellation for one task. */
  withTaskLock<T>(taskId: Hash, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(taskId, fn);
  }

  /** Caller must hold the task lock. Pays the node, then completes the task. */
  async recordSuccess(taskId: Hash, node: Identity, resultRef: ContentAddress): Promise<Task> {
    const task = this.require(taskId);
    this.assertExecutingBy(task, node);
    await this.settle(task, [() => this.ledger.release(task.escrow, node)], "release");
    this.transition(task, "executing", "completed");
    task.resultRef = resultRef;
    task.completedAt = this.clock();
    this.store?.saveTask(task);
    this.events.append({
      type: "task_completed",
      taskId: task.id,
      subjectId: task.id,
      data: { node, resultRef, amount: task.reward, attempt: task.attempt }
    });
    return copyTask(task);
  }

  /**
   * Caller must hold the task lock. Requeues while attempts and candidates
   * remain; otherwise refunds the submitter and slashes the node. The slash
   * is taken from the directory before the ledger call so concurrent
   * penalties against one node never exceed its stake.
   */
  async recordRejection(taskId: Hash, node: Identity): Promise<Task> {
    const task = this.require(taskId);
    this.assertExecutingBy(task, node);
    const excluded =
      this.config.excludeFailedNodes && !task.excludedNodes.includes(node)
        ? [...task.excludedNodes, node]
        : task.excludedNodes;
    const attemptsLeft = task.attempt < this.config.maxAttempts;
    const candidatesLeft = this.nodes.rankedCandidates(task.requiredCapabilities, excluded).length > 0;

    if (attemptsLeft && candidatesLeft) {
      task.excludedNodes = excluded;
      this.requeue(task, "verification_failed");
      return copyTask(task);
    }

    const penalty = Math.floor(task.reward * this.config.slashFraction);
    const slashAmount = Math.min(penalty, this.nodes.getNode(node).stake);
    if (slashAmount > 0) {
      this.nodes.slash(node, slashAmount);
    }
    task.excludedNodes = excluded;
    const pending: PendingSettlement = {
      node,
      attempt: task.attempt,
      reason: attemptsLeft ? "no_eligible_node" : "attempts_exhausted",
      slashAmount
    };
    task.pendingSettlement = pending;
    this.store?.saveTask(task);
    await this.finishRejection(task, pending);
    return copyTask(task);
  }

  restore(tasks: Task[], nonces: Array<{ submitter: Identity; nonce: number }>): void {
    for (const task of tasks) this.tasks.set(task.id, copyTask(task));
    for (const { submitter, nonce } of nonces) this.nonces.set(submitter, nonce);
  }

  private requeue(task: Task, reason: "timeout" | "verification_failed"): void {
    const previousNode = task.assignedNode;
    this.transition(task, "executing", "pending");
    task.assignedNode = undefined;
    this.store?.saveTask(task);
    this.events.append({
      type: "task_requeued",
      taskId: task.id,
      subjectId: task.id,
      data: { reason, attempt: task.attempt, previousNode: previousNode ?? null }
    });
  }

  private async finishRejection(task: Task, pending: PendingSettlement): Promise<void> {
    const ops: Array<() => Promise<unknown>> = [() => this.ledger.refund(task.escrow)];
    if (pending.slashAmount > 0) {
      ops.push(() => this.ledger.slash(pending.node, pending.slashAmount, `${task.id}:slash:${pending.attempt}`));
    }
    await this.settle(task, ops, "refund_and_slash");
    task.pendingSettlement = undefined;
    this.fail(task, pending.reason);
  }

  private async refundAndFail(task: Task, reason: TaskFailureReason): Promise<void> {
    await this.settle(task, [() => this.ledger.refund(task.escrow)], "refund");
    this.fail(task, reason);
  }

  private fail(task: Task, reason: TaskFailureReason): void {
    this.transition(task, task.status, "failed");
    task.assignedNode = undefined;
    task.failureReason = reason;
    task.completedAt = this.clock();
    this.store?.saveTask(task);
    this.events.append({
      type: "task_failed",
      taskId: task.id,
      subjectId: task.id,
      data: { reason, refundTo: task.submitter, amount: task.reward, attempt: task.attempt }
    });
  }

  /** Runs ledger operations in order; the caller commits state only if all succeed. */
  private async settle(task: Task, ops: Array<() => Promise<unknown>>, label: string): Promise<void> {
    this.settling.add(task.id);
    try {
      for (const op of ops) {
        await withLedgerRetry(`${label}:${task.id}`, op, this.retry, this.sleep);
      }
    } finally {
      this.settling.delete(task.id);
    }
  }

  private transition(task: Task, from: TaskStatus, to: TaskStatus): void {
    if (task.status !== from || !ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new CoreError("invalid_transition", `${task.id}: ${task.status} -> ${to}`);
    }
    task.status = to;
  }

  private assertExecutingBy(task: Task, node: Identity): void {
    if (task.status !== "executing" || task.assignedNode !== node || task.pendingSettlement) {
      throw new CoreError("stale_attempt", task.id);
    }
  }

  private dependenciesMet(task: Task): boolean {
    return task.dependsOn.every((dep) => this.tasks.get(dep)?.status === "completed");
  }

  private dependencyDead(task: Task): boolean {
    return task.dependsOn.some((dep) => {
      const status = this.tasks.get(dep)?.status;
      return status !== undefined && TERMINAL_STATUSES.has(status) && status !== "completed";
    });
  }

  private require(taskId: Hash): Task {
    const task = this.tasks.get(taskId);
    if (!task) throw new CoreError("not_found", `task ${taskId}`);
    return task;
  }
}
