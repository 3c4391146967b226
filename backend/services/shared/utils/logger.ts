// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";
import { requireEnv } from "../config/env";

/**
 * Shared Logger (authoritative)
 *
 * Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap BEFORE
 * creating any request loggers (e.g., pino-http).
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger("user");
 */

const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function readLevel(): LevelWithSilent {
  const raw = requireEnv("LOG_LEVEL");
  if (!isLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

// NOTE: no "service" in base until initLogger() runs.
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: readLevel(),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({
    ...pinoOptions,
    level: logger.level,
    base: { service: SERVICE_NAME },
  });
}

export function currentServiceName(): string {
  return SERVICE_NAME || "uninitialized";
}

/** Set level dynamically (e.g., in tests). */
export function setLogLevel(level: string): void {
  if (!isLevel(level)) throw new Error(`Invalid LOG_LEVEL: "${level}"`);
  logger.level = level;
}

// ───────────────────────────── Request context helper ─────────────────────────
export type LogContext = {
  requestId: string | null;
  path: string;
  method: string;
  entityId?: string;
  ip?: string;
  service?: string;
};

export function extractLogContext(req: Request): LogContext {
  return {
    requestId: req.requestId ?? null,
    path: req.originalUrl,
    method: req.method,
    entityId: req.params?.id,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
