/**
 * logger.ts — Structured logging for the device inventory service
 *
 * Built on pino. Level and output format come from resolveConfig():
 *   DEVICE_STORE_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   DEVICE_STORE_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   DEVICE_STORE_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.boot.info("server starting");
 *   log.db.warn({ attempt: 3 }, "could not connect to postgres: ECONNREFUSED");
 *
 * Subsystem loggers:
 *   log.boot, log.db, log.devices, log.http
 */

import pino from "pino";
import type { Logger } from "pino";
import { resolveConfig } from "./config.js";

// ─── Configuration ──────────────────────────────────────────────

const config = resolveConfig();

/** Build pino transport configuration */
function resolveTransport(pretty: boolean): pino.TransportSingleOptions | undefined {
  if (!pretty) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const transport = resolveTransport(config.logPretty);

export const rootLogger: Logger = pino({
  level: config.logLevel,
  ...(transport ? { transport } : {}),
  base: { service: "device-inventory" },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      "password", "*.password",
      "connectionString", "*.connectionString",
      "authorization", "*.authorization",
      "req.headers.authorization",
      "req.headers.cookie",
    ],
    censor: "[REDACTED]",
  },
});

// ─── Subsystem Child Loggers ────────────────────────────────────

export const log = {
  /** Boot/startup sequence */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** Pool, connectivity and schema */
  db: rootLogger.child({ subsystem: "db" }),
  /** Device merge and query operations */
  devices: rootLogger.child({ subsystem: "devices" }),
  /** HTTP/API layer */
  http: rootLogger.child({ subsystem: "http" }),
  root: rootLogger,
};

export type { Logger };
