// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function threshold(): number {
  const configured = process.env.CORE_LOG_LEVEL;
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return LEVEL_ORDER[configured];
  }
  if (configured === "silent") return Number.POSITIVE_INFINITY;
  return LEVEL_ORDER.info;
}

function emit(level: Level, message: string, meta: unknown, sink: (line: string) => void): void {
  if (LEVEL_ORDER[level] < threshold()) return;
  sink(JSON.stringify({ level, message, meta, ts: Date.now() }));
}

export const log = {
  debug(message: string, meta?: unknown): void {
    emit("debug", message, meta, console.log);
  },
  info(message: string, meta?: unknown): void {
    emit("info", message, meta, console.log);
  },
  warn(message: string, meta?: unknown): void {
    emit("warn", message, meta, console.warn);
  },
  error(message: string, meta?: unknown): void {
    emit("error", message, meta, console.error);
  }
};
