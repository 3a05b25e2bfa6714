/**
 * logger.ts
 *
 * Structured runtime logger for the mapping engine.
 * - JSON-friendly entries kept in a bounded in-memory summary
 * - log(level, event, meta)
 * - helpers: debug, info, warn, error
 *
 * Gate: warn and error always reach the console. debug and info only do when
 * RDF_MAPPER_DEBUG is set in the environment or configureLogging({ console: true })
 * was called.
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
  counters: Record<string, number>;
}

const MAX_ENTRIES = 10000;

function nowIso() { return new Date().toISOString(); }

function envDebugEnabled(): boolean {
  if (typeof process === "undefined" || !process.env) return false;
  const raw = process.env.RDF_MAPPER_DEBUG;
  return raw !== undefined && raw !== "" && raw !== "0" && raw.toLowerCase() !== "false";
}

const state: { console: boolean; summary: LogSummary } = {
  console: envDebugEnabled(),
  summary: { startedAt: nowIso(), logs: [], counters: {} },
};

export function configureLogging(options: { console?: boolean }) {
  if (options.console !== undefined) state.console = options.console;
}

export function isDebugEnabled(): boolean {
  return state.console;
}

function safeConsole(level: LogLevel, ...args: unknown[]) {
  if (typeof console === "undefined") return;
  if (level === "debug") {
    console.debug(...args);
  } else if (level === "info") {
    console.info(...args);
  } else if (level === "warn") {
    console.warn(...args);
  } else {
    console.error(...args);
  }
}

export function incr(counterName: string, n: number = 1) {
  const counters = state.summary.counters;
  counters[counterName] = (counters[counterName] ?? 0) + n;
}

export function log(level: LogLevel, eventName: string, meta?: Meta) {
  const entry: LogEntry = { ts: nowIso(), level, event: eventName, meta: meta ?? {} };
  const logs = state.summary.logs;
  logs.push(entry);
  if (logs.length > MAX_ENTRIES) logs.shift();
  incr(`log.${level}`);

  const shouldConsole = level === "warn" || level === "error" || state.console;
  if (shouldConsole) {
    safeConsole(level, "[RDF_MAPPER]", entry.event, entry.meta);
  }
}

// convenience helpers
export function debug(event: string, meta?: Meta) { log("debug", event, meta); }
export function info(event: string, meta?: Meta) { log("info", event, meta); }
export function warn(event: string, meta?: Meta) { log("warn", event, meta); }
export function error(event: string, meta?: Meta) { log("error", event, meta); }

export function getLogSummary(): Readonly<LogSummary> {
  return state.summary;
}

export function clearLogSummary() {
  state.summary = { startedAt: nowIso(), logs: [], counters: {} };
}
