import { createWriteStream, type WriteStream } from "node:fs";
import { format } from "node:util";
import type { LogLevel } from "../../shared/types.js";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(scope: string): Logger;
}

export type LogWriter = (line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

let currentLevel: LogLevel = "info";
let writer: LogWriter | null = null;
let fileStream: WriteStream | null = null;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

// The terminal belongs to the UI, so nothing is written until a sink is configured.
export function setLogWriter(next: LogWriter | null): void {
  writer = next;
}

export function configureLogFile(filePath: string): void {
  void closeLogFile();
  const stream = createWriteStream(filePath, { flags: "a" });
  stream.on("error", () => {
    setLogWriter(null);
  });
  fileStream = stream;
  setLogWriter((line) => {
    stream.write(`${line}\n`);
  });
}

/** Resolves once everything written so far has reached the file. */
export function closeLogFile(): Promise<void> {
  const stream = fileStream;
  if (!stream) {
    return Promise.resolve();
  }

  fileStream = null;
  setLogWriter(null);
  return new Promise((resolve) => {
    // A stream that already failed has nothing left to flush.
    stream.once("error", () => resolve());
    stream.end(() => resolve());
  });
}

function normalizeError(value: unknown): unknown {
  if (!(value instanceof Error)) {
    return value;
  }

  return {
    name: value.name,
    message: value.message,
    stack: value.stack
  };
}

function emit(level: Exclude<LogLevel, "silent">, scope: string | null, message: string, args: unknown[]): void {
  if (!writer || LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  const prefix = scope
    ? `${new Date().toISOString()} [${level.toUpperCase()}] [${scope}]`
    : `${new Date().toISOString()} [${level.toUpperCase()}]`;
  const rest = args.map((arg) => format("%o", normalizeError(arg)));
  writer([prefix, message, ...rest].join(" "));
}

export function createLogger(scope?: string): Logger {
  const scoped = scope?.trim() || null;

  return {
    debug: (message, ...args) => emit("debug", scoped, message, args),
    info: (message, ...args) => emit("info", scoped, message, args),
    warn: (message, ...args) => emit("warn", scoped, message, args),
    error: (message, ...args) => emit("error", scoped, message, args),
    child: (childScope) => {
      const trimmed = childScope.trim();
      return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed);
    }
  };
}

export const logger = createLogger("termtune");
