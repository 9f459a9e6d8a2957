// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { CoreError } from "../common/errors.js";
import { log } from "../common/logger.js";
import type { Clock, ContentAddress, Hash, Identity, VerificationRecord } from "../common/types.js";
import type { CoreStore } from "../db/store.js";
import { TaskEventLog } from "../events/event-log.js";
import { FunctionRegistry } from "../registry/function-registry.js";
import { TaskScheduler } from "../scheduler/task-scheduler.js";
import type { ResultVerifier } from "./verifier.js";

export interface SubmitResultInput {
  taskId: Hash;
  node: Identity;
  resultRef: ContentAddress;
  proof: string;
}

export class ResultAggregator {
  private readonly records = new Map<Hash, VerificationRecord[]>();

  constructor(
    private readonly scheduler: TaskScheduler,
    private readonly registry: FunctionRegistry,
    private readonly verifier: ResultVerifier,
    private readonly events: TaskEventLog,
    private readonly clock: Clock = Date.now,
    private readonly store?: CoreStore
  ) {}

  /**
   * Authorization is judged against the task as it stands when the call
   * arrives. Once the per-task lock is held, a task that has moved on
   * (another call for the same attempt won, it timed out, or its rejection
   * is awaiting settlement) yields `stale_attempt`.
   */
  async submitResult(input: SubmitResultInput): Promise<VerificationRecord> {
    const observed = this.scheduler.getTask(input.taskId);
    if (observed.status !== "executing" || observed.assignedNode !== input.node) {
      throw new CoreError("not_assigned", `${input.node} does not hold ${input.taskId}`);
    }
    const attempt = observed.attempt;

    return this.scheduler.withTaskLock(input.taskId, async () => {
      const task = this.scheduler.getTask(input.taskId);
      if (
        task.status !== "executing" ||
        task.attempt !== attempt ||
        task.assignedNode !== input.node ||
        task.pendingSettlement
      ) {
        throw new CoreError("stale_attempt", `${input.taskId} attempt ${attempt}`);
      }
      const artifact = this.registry.get(task.functionId);
      const outcome = await this.verifier.verify({
        taskId: task.id,
        functionId: task.functionId,
        contentRef: artifact.contentRef,
        node: input.node,
        attempt,
        resultRef: input.resultRef,
        proof: input.proof
      });

      const record: VerificationRecord = {
        taskId: task.id,
        attempt,
        node: input.node,
        verifierKind: this.verifier.kind,
        success: outcome.success,
        detail: outcome.detail,
        verifiedAt: this.clock()
      };
      this.append(record);

      if (outcome.success) {
        await this.scheduler.recordSuccess(task.id, input.node, input.resultRef);
      } else {
        log.warn("result rejected", { taskId: task.id, node: input.node, attempt, detail: outcome.detail });
        await this.scheduler.recordRejection(task.id, input.node);
      }
      return { ...record };
    });
  }

  verificationsFor(taskId: Hash): VerificationRecord[] {
    return (this.records.get(taskId) ?? []).map((record) => ({ ...record }));
  }

  restore(records: VerificationRecord[]): void {
    for (const record of records) {
      const existing = this.records.get(record.taskId) ?? [];
      existing.push({ ...record });
      this.records.set(record.taskId, existing);
    }
  }

  private append(record: VerificationRecord): void {
    const existing = this.records.get(record.taskId) ?? [];
    existing.push(record);
    this.records.set(record.taskId, existing);
    this.store?.appendVerification(record);
    this.events.append({
      type: "result_verified",
      taskId: record.taskId,
      subjectId: record.taskId,
      data: {
        node: record.node,
        attempt: record.attempt,
        success: record.success,
        verifierKind: record.verifierKind,
        detail: record.detail ?? null
      }
    });
  }
}
