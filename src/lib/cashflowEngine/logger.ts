/**
 * Cashflow Engine — Logging sink
 *
 * Stages log through an injected CashflowLogger; logging never changes
 * control flow.
 */

import type { LogLevel } from "@/lib/env/server";

export type LogMeta = Record<string, unknown>;

export interface CashflowLogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

/**
 * Console-backed logger. Lines look like `[cashflowEngine] message {meta}`.
 */
export function consoleLogger(tag = "cashflowEngine", level: LogLevel = "warn"): CashflowLogger {
  const threshold = RANK[level];
  const emit =
    (at: Exclude<LogLevel, "silent">, write: (...args: unknown[]) => void) =>
    (message: string, meta?: LogMeta): void => {
      if (RANK[at] < threshold) return;
      if (meta) write(`[${tag}] ${message}`, meta);
      else write(`[${tag}] ${message}`);
    };

  return {
    debug: emit("debug", console.debug),
    info: emit("info", console.info),
    warn: emit("warn", console.warn),
    error: emit("error", console.error),
  };
}

const noop = (): void => {};

export const silentLogger: CashflowLogger = { debug: noop, info: noop, warn: noop, error: noop };

/** Logger that keeps every call in memory. */
export function recordingLogger(): CashflowLogger & {
  entries: { level: Exclude<LogLevel, "silent">; message: string; meta?: LogMeta }[];
} {
  const entries: { level: Exclude<LogLevel, "silent">; message: string; meta?: LogMeta }[] = [];
  const record =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, meta?: LogMeta): void => {
      entries.push({ level, message, meta });
    };
  return { entries, debug: record("debug"), info: record("info"), warn: record("warn"), error: record("error") };
}
