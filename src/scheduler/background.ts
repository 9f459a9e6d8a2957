// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { log } from "../common/logger.js";
import { TaskScheduler } from "./task-scheduler.js";
import type { Assignment } from "./task-scheduler.js";

export interface LoopHandle {
  stop(): void;
}

/**
 * Recurring deadline sweep. Each tick requeues or fails overdue tasks,
 * finishes rejections a ledger outage left unsettled and fails pending tasks
 * whose dependencies died. Ticks never overlap.
 */
export function startTimeoutSweeper(scheduler: TaskScheduler, intervalMs: number = 5_000): LoopHandle {
  let running = false;
  const tick = async () => {
    if (running) return;
    running = true;
    try {
      const timedOut = await scheduler.sweepTimeouts();
      const settled = await scheduler.settlePendingRejections();
      const blocked = await scheduler.failBlockedTasks();
      if (timedOut > 0 || settled > 0 || blocked > 0) {
        log.info("sweep", { timedOut, settled, blocked });
      }
    } catch (err) {
      log.error("sweep tick failed", { error: String(err) });
    } finally {
      running = false;
    }
  };
  const timer = setInterval(() => {
    void tick();
  }, intervalMs);
  timer.unref();
  return { stop: () => clearInterval(timer) };
}

/** Drains `assign()` on every tick; `onAssigned` hands each assignment to the execution layer. */
export function startDispatchLoop(
  scheduler: TaskScheduler,
  intervalMs: number = 1_000,
  onAssigned?: (assignment: Assignment) => void
): LoopHandle {
  const timer = setInterval(() => {
    for (let assignment = scheduler.assign(); assignment; assignment = scheduler.assign()) {
      log.info("task assigned", {
        taskId: assignment.task.id,
        node: assignment.node.address,
        attempt: assignment.task.attempt
      });
      onAssigned?.(assignment);
    }
  }, intervalMs);
  timer.unref();
  return { stop: () => clearInterval(timer) };
}
