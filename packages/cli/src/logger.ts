// =============================================================================
// @newsdesk/cli — Structured JSON logger
// =============================================================================
// One JSON object per line. Child loggers carry bindings such as runId and
// component into every entry. The CLI writes every session to
// LOG_DIR/session_<id>.log and echoes to stderr only in verbose mode.
// =============================================================================

import { randomUUID } from "node:crypto";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export type LineWriter = (line: string) => void;

export interface LoggerOptions {
  level?: string;
  /** Defaults to stderr so stdout only carries command output. */
  write?: LineWriter;
}

export const stderrWriter: LineWriter = (line) => void process.stderr.write(line);

/** Appends lines to `file`; the directory is created on the first line. */
export function createFileWriter(file: string): LineWriter {
  let ready = false;
  return (line) => {
    if (!ready) {
      mkdirSync(dirname(file), { recursive: true });
      ready = true;
    }
    appendFileSync(file, line, "utf-8");
  };
}

export function teeWriter(...writers: LineWriter[]): LineWriter {
  return (line) => {
    for (const write of writers) write(line);
  };
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_VALUES, value);
}

export function createRunId(): string {
  return randomUUID();
}

export function createLogger(options?: LoggerOptions): Logger {
  const levelName = options?.level ?? "info";
  const threshold = isLogLevel(levelName)
    ? LEVEL_VALUES[levelName]
    : LEVEL_VALUES.info;
  const write = options?.write ?? stderrWriter;

  return buildLogger(threshold, write, {});
}

function buildLogger(
  threshold: number,
  writeLine: LineWriter,
  bindings: Record<string, unknown>,
): Logger {
  function write(
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_VALUES[level] < threshold) return;

    const entry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      ...bindings,
      ...data,
    };

    writeLine(JSON.stringify(entry) + "\n");
  }

  return {
    trace: (msg, data) => write("trace", msg, data),
    debug: (msg, data) => write("debug", msg, data),
    info: (msg, data) => write("info", msg, data),
    warn: (msg, data) => write("warn", msg, data),
    error: (msg, data) => write("error", msg, data),
    fatal: (msg, data) => write("fatal", msg, data),
    child: (childBindings) =>
      buildLogger(threshold, writeLine, { ...bindings, ...childBindings }),
  };
}

export function logExternalCall(
  logger: Logger,
  service: string,
  operation: string,
  durationMs: number,
  error?: string,
): void {
  const data: Record<string, unknown> = {
    service,
    operation,
    durationMs: Math.round(durationMs),
  };
  if (error !== undefined) {
    data.error = error;
    logger.error("External call failed", data);
  } else {
    logger.info("External call completed", data);
  }
}
