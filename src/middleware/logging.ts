// =============================================================================
// Logging — Structured log entries & workflow event logging
// =============================================================================

import type { WorkflowEvent } from "../domain/graph.schema.js";
import type { EventBus } from "../graph/event-bus.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  runId?: string;
  data?: Record<string, unknown>;
}

export type Logger = (entry: LogEntry) => void;

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped (default: "info") */
  level?: LogLevel;
  /** Where formatted lines go (defaults to console.log / console.error) */
  write?: (line: string, entry: LogEntry) => void;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  const write =
    options.write ??
    ((line: string, entry: LogEntry) => {
      // eslint-disable-next-line no-console
      (entry.level === "error" ? console.error : console.log)(line);
    });

  return (entry) => {
    if (LOG_LEVELS.indexOf(entry.level) < threshold) return;
    write(formatLogEntry(entry), entry);
  };
}

export function formatLogEntry(entry: LogEntry): string {
  const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
  const run = entry.runId ? ` run=${entry.runId}` : "";
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
  return `${prefix} ${entry.event}${run}${data}`;
}

function levelOf(event: WorkflowEvent): LogLevel {
  switch (event.type) {
    case "run:start":
    case "run:complete":
      return "info";
    case "node:start":
    case "node:complete":
    case "run:evicted":
      return "debug";
    case "node:error":
      return "warn";
    case "run:failed":
      return "error";
  }
}

/** Logs every workflow event. Returns an unsubscribe fn. */
export function attachWorkflowLogging(
  bus: EventBus,
  logger: Logger,
  now: () => number = Date.now,
): () => void {
  return bus.onAny((event) => {
    const { type, runId, ...data } = event;
    logger({
      timestamp: now(),
      level: levelOf(event),
      event: type,
      runId,
      data: Object.keys(data).length > 0 ? data : undefined,
    });
  });
}
