/**
 * Structured logger
 *
 * Console-backed, leveled logger used by every server module.
 *
 * - development/test: `[timestamp] [LEVEL] message {context}`
 * - production: one JSON object per line, ready for log aggregation
 *
 * Sensitive keys are redacted recursively before anything is written.
 * Level and format come from the validated env config, once, at module load.
 */

import os from "node:os";
import { env } from "./config/env";

type LevelName = "debug" | "info" | "warn" | "error" | "fatal";

const LEVELS: Record<LevelName, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "apikey",
  "api_key",
  "cookie",
  "email",
];

const REDACTED = "***";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  fatal(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((s) => lower.includes(s));
}

function isRecord(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null;
}

function serializeError(error: Error): LogContext {
  return { name: error.name, message: error.message, stack: error.stack };
}

function redact(context: LogContext): LogContext {
  const result: LogContext = {};

  for (const [key, value] of Object.entries(context)) {
    if (!value) {
      result[key] = value;
      continue;
    }

    if (isSensitiveKey(key)) {
      result[key] = REDACTED;
      continue;
    }

    if (value instanceof Error) {
      result[key] = serializeError(value);
    } else if (Array.isArray(value)) {
      result[key] = value;
    } else if (isRecord(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

const minLevel: LevelName = env.LOG_LEVEL;
const jsonOutput = env.NODE_ENV === "production";
const hostname = os.hostname();

function write(level: LevelName, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.error(line);
  }
}

function emit(level: LevelName, bindings: LogContext, message: string, context?: LogContext) {
  if (LEVELS[level] < LEVELS[minLevel]) return;

  const fields = redact({ ...bindings, ...context });
  const timestamp = new Date().toISOString();

  if (jsonOutput) {
    write(
      level,
      JSON.stringify({
        timestamp,
        level: LEVELS[level],
        levelName: level,
        message,
        hostname,
        pid: process.pid,
        ...fields,
      })
    );
    return;
  }

  const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
  write(level, `[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}`);
}

function buildLogger(bindings: LogContext): Logger {
  return {
    debug: (message, context) => emit("debug", bindings, message, context),
    info: (message, context) => emit("info", bindings, message, context),
    warn: (message, context) => emit("warn", bindings, message, context),
    error: (message, context) => emit("error", bindings, message, context),
    fatal: (message, context) => emit("fatal", bindings, message, context),
    child: (extra) => buildLogger({ ...bindings, ...extra }),
  };
}

const logger = buildLogger({});

export function createChildLogger(bindings: LogContext): Logger {
  return logger.child(bindings);
}

export default logger;
