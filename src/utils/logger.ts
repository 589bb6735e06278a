import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { stripVTControlCharacters } from "node:util";
import color from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "info";
let logFile: string | null = null;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: color.gray,
  info: color.cyan,
  warn: color.yellow,
  error: color.red,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_PRIORITY;
}

/**
 * Mirror every emitted line (without colors) to a file. Pass null to stop.
 */
export function setLogFile(filePath: string | null): void {
  if (filePath) {
    mkdirSync(dirname(filePath), { recursive: true });
  }
  logFile = filePath;
}

export function getLogFile(): string | null {
  return logFile;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatMessage(
  level: LogLevel,
  scope: string | null,
  message: string,
  data?: unknown,
): string {
  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` ${color.dim(`[${scope}]`)}` : "";

  let formatted = `${LEVEL_COLORS[level](`[${timestamp}] ${levelStr}`)}${scopeStr} ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      formatted += ` ${data.message}`;
    } else if (typeof data === "object") {
      formatted += ` ${JSON.stringify(data, null, 2)}`;
    } else {
      formatted += ` ${String(data)}`;
    }
  }

  return formatted;
}

function emit(level: LogLevel, scope: string | null, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;

  const line = formatMessage(level, scope, message, data);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }

  if (logFile) {
    try {
      appendFileSync(logFile, `${stripVTControlCharacters(line)}\n`);
    } catch (err) {
      const target = logFile;
      logFile = null;
      console.error(`Log file ${target} is not writable, file logging disabled: ${String(err)}`);
    }
  }
}

export function debug(message: string, data?: unknown): void {
  emit("debug", null, message, data);
}

export function info(message: string, data?: unknown): void {
  emit("info", null, message, data);
}

export function warn(message: string, data?: unknown): void {
  emit("warn", null, message, data);
}

export function error(message: string, data?: unknown): void {
  emit("error", null, message, data);
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

function scoped(scope: string): Logger {
  return {
    debug: (message, data) => emit("debug", scope, message, data),
    info: (message, data) => emit("info", scope, message, data),
    warn: (message, data) => emit("warn", scope, message, data),
    error: (message, data) => emit("error", scope, message, data),
    child: (sub) => scoped(`${scope}:${sub}`),
  };
}

export const logger = {
  debug,
  info,
  warn,
  error,
  child: scoped,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
  setFile: setLogFile,
};
