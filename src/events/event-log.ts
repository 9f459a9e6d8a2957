// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { sha256Hex } from "../common/crypto-utils.js";
import type { Clock, Hash, TaskEvent, TaskEventType } from "../common/types.js";

export const EVENT_GENESIS = "GENESIS";

export interface EventSink {
  appendEvent(event: TaskEvent): void;
}

export function hashEventPayload(payload: Omit<TaskEvent, "hash">): string {
  return sha256Hex(
    JSON.stringify({
      offset: payload.offset,
      type: payload.type,
      taskId: payload.taskId,
      subjectId: payload.subjectId,
      at: payload.at,
      data: payload.data,
      prevHash: payload.prevHash
    })
  );
}

/**
 * Append-only, hash-chained log of state changes. Offsets start at 0 and
 * are dense, so a reader can resume from the last offset it saw.
 */
export class TaskEventLog {
  private readonly events: TaskEvent[] = [];
  private waiters: Array<() => void> = [];

  constructor(
    private readonly clock: Clock = Date.now,
    private readonly sink?: EventSink
  ) {}

  append(input: {
    type: TaskEventType;
    subjectId: string;
    taskId?: Hash;
    data?: TaskEvent["data"];
  }): TaskEvent {
    const prev = this.events[this.events.length - 1];
    const unsigned: Omit<TaskEvent, "hash"> = {
      offset: this.events.length,
      type: input.type,
      taskId: input.taskId,
      subjectId: input.subjectId,
      at: this.clock(),
      data: input.data ?? {},
      prevHash: prev?.hash ?? EVENT_GENESIS
    };
    const event: TaskEvent = { ...unsigned, hash: hashEventPayload(unsigned) };
    this.events.push(event);
    this.sink?.appendEvent(event);
    this.wake();
    return event;
  }

  /** Rehydrate from persisted events. Only valid on an empty log. */
  restore(events: TaskEvent[]): void {
    if (this.events.length > 0) {
      throw new Error("event_log_not_empty");
    }
    const check = verifyEventChain(events);
    if (!check.ok) {
      throw new Error(`event_chain_invalid: ${check.reason}`);
    }
    this.events.push(...events);
  }

  read(offset = 0, limit = 100): TaskEvent[] {
    const start = Math.max(0, offset);
    return this.events.slice(start, start + Math.max(0, limit));
  }

  get size(): number {
    return this.events.length;
  }

  /**
   * Infinite sequence starting at `fromOffset`. Waits for new appends once
   * caught up; ends only when `signal` aborts.
   */
  async *stream(fromOffset = 0, signal?: AbortSignal): AsyncGenerator<TaskEvent, void, undefined> {
    let cursor = Math.max(0, fromOffset);
    while (!signal?.aborted) {
      if (cursor < this.events.length) {
        yield this.events[cursor];
        cursor += 1;
        continue;
      }
      await this.nextAppend(signal);
    }
  }

  private nextAppend(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        signal?.removeEventListener("abort", done);
        resolve();
      };
      this.waiters.push(done);
      signal?.addEventListener("abort", done, { once: true });
    });
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter();
  }
}

export function verifyEventChain(events: TaskEvent[]): { ok: boolean; reason?: string } {
  let prevHash = EVENT_GENESIS;
  for (let i = 0; i < events.length; i += 1) {
    const event = events[i];
    if (event.offset !== i) {
      return { ok: false, reason: "invalid_offset" };
    }
    if (event.prevHash !== prevHash) {
      return { ok: false, reason: "invalid_prev_hash" };
    }
    const { hash, ...unsigned } = event;
    if (hashEventPayload(unsigned) !== hash) {
      return { ok: false, reason: "hash_mismatch" };
    }
    prevHash = hash;
  }
  return { ok: true };
}
