import type { LogLevel } from "./settings.js";

export type LogValue = unknown;

type EventLevel = Exclude<LogLevel, "silent">;

const LEVEL_RANK: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3
};

export interface LogWriter {
  write(chunk: string): unknown;
}

let threshold: LogLevel = "info";
let writer: LogWriter = process.stderr;

export function configureLogging(level: LogLevel, target: LogWriter = process.stderr): void {
  threshold = level;
  writer = target;
}

// stdout belongs to command output; every event goes to stderr.
function emit(level: EventLevel, event: string, fields: Record<string, LogValue>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
    return;
  }

  const payload = {
    level,
    event,
    timestamp: new Date().toISOString(),
    ...fields
  };

  writer.write(`${JSON.stringify(payload)}\n`);
}

export function logInfo(event: string, fields: Record<string, LogValue> = {}): void {
  emit("info", event, fields);
}

export function logWarn(event: string, fields: Record<string, LogValue> = {}): void {
  emit("warn", event, fields);
}

export function logError(event: string, fields: Record<string, LogValue> = {}): void {
  emit("error", event, fields);
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}
