/**
 * logger.ts
 *
 * Structured runtime logger for the compiler.
 * - log(level, event, meta) keeps a JSON-friendly record in an in-memory summary
 * - debug/info/warn/error helpers
 * - once(event, key, ...) logs the first occurrence of an event+key fingerprint and
 *   counts the rest as suppressed
 * - timedAsync(event, meta, fn) measures async durations
 *
 * Console output is gated by a minimum level: VOCAB_LOG_LEVEL (debug|info|warn|error|silent),
 * default "info". The summary records every entry regardless of the gate.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
type Meta = Record<string, unknown> | undefined;

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  meta: Record<string, unknown>;
}

export interface LogSummary {
  startedAt: string;
  logs: LogEntry[];
  counters: Record<LogLevel, number>;
  suppressed: Record<string, number>;
}

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// Summary ring size
const MAX_LOGS = 20000;

function nowIso() { return new Date().toISOString(); }

function isLevelName(value: unknown): value is LogLevel | "silent" {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | "silent" | undefined {
  const v = value?.trim().toLowerCase();
  return isLevelName(v) ? v : undefined;
}

function initialLevel(): LogLevel | "silent" {
  const fromEnv = typeof process !== "undefined" ? process.env.VOCAB_LOG_LEVEL : undefined;
  return isLevelName(fromEnv) ? fromEnv : "info";
}

let minLevel: LogLevel | "silent" = initialLevel();
let summary: LogSummary = freshSummary();
const seenFingerprints = new Set<string>();

function freshSummary(): LogSummary {
  return {
    startedAt: nowIso(),
    logs: [],
    counters: { debug: 0, info: 0, warn: 0, error: 0 },
    suppressed: {},
  };
}

function consoleFor(level: LogLevel): (...args: unknown[]) => void {
  if (level === "debug") return console.debug;
  if (level === "info") return console.info;
  if (level === "warn") return console.warn;
  return console.error;
}

export function setLogLevel(level: LogLevel | "silent"): void {
  minLevel = level;
}

export function log(level: LogLevel, event: string, meta?: Meta): void {
  const entry: LogEntry = { ts: nowIso(), level, event, meta: meta ?? {} };
  summary.logs.push(entry);
  if (summary.logs.length > MAX_LOGS) summary.logs.shift();
  summary.counters[level] += 1;

  if (LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]) {
    if (meta && Object.keys(meta).length > 0) {
      consoleFor(level)("[VC_LOG]", event, meta);
    } else {
      consoleFor(level)("[VC_LOG]", event);
    }
  }
}

// convenience helpers
export function debug(event: string, meta?: Meta) { log("debug", event, meta); }
export function info(event: string, meta?: Meta) { log("info", event, meta); }
export function warn(event: string, meta?: Meta) { log("warn", event, meta); }
export function error(event: string, meta?: Meta) { log("error", event, meta); }

/**
 * once - log an event the first time its (event, key) fingerprint is seen.
 * Later occurrences only bump summary.suppressed[fingerprint]. Returns true when logged.
 */
export function once(level: LogLevel, event: string, key: string, meta?: Meta): boolean {
  const fp = `${event}|${key}`;
  if (seenFingerprints.has(fp)) {
    summary.suppressed[fp] = (summary.suppressed[fp] ?? 0) + 1;
    return false;
  }
  seenFingerprints.add(fp);
  log(level, event, meta);
  return true;
}

/**
 * timedAsync - run an async function, record start/end and duration in logs
 * returns the wrapped function result.
 */
export async function timedAsync<T>(eventName: string, meta: Meta, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  debug(`${eventName}.start`, meta);
  try {
    const res = await fn();
    debug(`${eventName}.end`, { durationMs: Date.now() - start, ...(meta ?? {}) });
    return res;
  } catch (err) {
    error(`${eventName}.error`, {
      durationMs: Date.now() - start,
      error: err instanceof Error ? err.message : String(err),
      ...(meta ?? {}),
    });
    throw err;
  }
}

/**
 * getSummary - returns a deep copy of the current summary for external tooling
 */
export function getSummary(): LogSummary {
  return structuredClone(summary);
}

/** Start a new summary and forget `once` fingerprints (one compilation = one summary). */
export function resetSummary(): void {
  summary = freshSummary();
  seenFingerprints.clear();
}
