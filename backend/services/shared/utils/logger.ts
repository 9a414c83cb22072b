// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, { type Logger, type LoggerOptions, type LevelWithSilent } from "pino";

/**
 * Shared pino logger (stdout only).
 *
 * Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap BEFORE
 * creating any request loggers (pino-http), so every line carries `service`.
 *
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger(SERVICE_NAME);
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

function requireLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "").trim();
  if (!raw) throw new Error("Missing required env var: LOG_LEVEL");
  if (!isLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

const pinoOptions: LoggerOptions = {
  level: requireLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.headers['x-api-key']",
      "res.headers['set-cookie']",
    ],
  },
};

let SERVICE_NAME = "";

export let logger: Logger = pino(pinoOptions);

export function initLogger(serviceName: string): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({ ...pinoOptions, base: { service: SERVICE_NAME } });
}

/** Request fields worth attaching to an error line. */
export function extractLogContext(req: Request): Record<string, unknown> {
  const hdr =
    req.headers["x-request-id"] ||
    req.headers["x-correlation-id"] ||
    req.headers["x-amzn-trace-id"];
  const hdrId = Array.isArray(hdr) ? hdr[0] : hdr;
  return {
    requestId: req.id ?? hdrId ?? null,
    path: req.originalUrl,
    method: req.method,
    entityId: req.params?.id,
    service: SERVICE_NAME || undefined,
  };
}
