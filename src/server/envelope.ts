/**
 * envelope.ts — API response envelope.
 *
 * Consistent response shape for all API consumers:
 *   Success: { ok: true, data: T, meta: { requestId, timestamp, durationMs } }
 *   Error:   { ok: false, error: { code, message, detail? }, meta: ... }
 *
 * Usage in routes:
 *   sendOk(res, { devices, count: devices.length });
 *   sendFail(res, ErrorCode.NOT_FOUND, "No device with that UDID", 404);
 */

import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { log } from "./logger.js";
import { DeviceStoreErrorCode, isDeviceStoreError, type DeviceStoreErrorCodeValue } from "./errors.js";

// ─── Error Codes (stable, machine-readable) ─────────────────────

export const ErrorCode = {
  // 503 — subsystem not ready
  DATABASE_UNAVAILABLE: "DATABASE_UNAVAILABLE",
  // 400 — client errors
  INVALID_PARAM: "INVALID_PARAM",
  NOT_FOUND: "NOT_FOUND",
  UNSUPPORTED_SOURCE: "UNSUPPORTED_SOURCE",
  INVALID_PROJECTION: "INVALID_PROJECTION",
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
  // 500 — upstream failures
  QUERY_FAILED: "QUERY_FAILED",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ─── Envelope types ─────────────────────────────────────────────

export interface ApiMeta {
  requestId: string;
  timestamp: string;
  durationMs: number;
}

export interface ApiSuccess<T = unknown> {
  ok: true;
  data: T;
  meta: ApiMeta;
}

export interface ApiErrorResponse {
  ok: false;
  error: {
    code: string;
    message: string;
    detail?: unknown;
  };
  meta: ApiMeta;
}

export type ApiEnvelope<T = unknown> = ApiSuccess<T> | ApiErrorResponse;

// ─── Middleware: attach requestId + startTime ───────────────────

export function envelopeMiddleware(_req: Request, res: Response, next: NextFunction): void {
  const requestId = randomUUID();
  res.locals._requestId = requestId;
  res.locals._startTime = Date.now();
  res.setHeader("X-Request-Id", requestId);
  next();
}

// ─── Helpers ────────────────────────────────────────────────────

function buildMeta(res: Response): ApiMeta {
  const requestId: unknown = res.locals._requestId;
  const startTime: unknown = res.locals._startTime;
  return {
    requestId: typeof requestId === "string" ? requestId : "unknown",
    timestamp: new Date().toISOString(),
    durationMs: typeof startTime === "number" ? Date.now() - startTime : 0,
  };
}

/** Send a success envelope. */
export function sendOk<T>(res: Response, data: T, statusCode = 200): void {
  const envelope: ApiSuccess<T> = { ok: true, data, meta: buildMeta(res) };
  res.status(statusCode).json(envelope);
}

/** Send an error envelope. */
export function sendFail(
  res: Response,
  code: ErrorCodeValue,
  message: string,
  statusCode = 400,
  detail?: unknown,
): void {
  const envelope: ApiErrorResponse = {
    ok: false,
    error: {
      code,
      message,
      ...(detail !== undefined ? { detail } : {}),
    },
    meta: buildMeta(res),
  };
  res.status(statusCode).json(envelope);
}

// ─── Catch-all error handler (mount AFTER routes) ───────────────

const STORE_ERROR_STATUS: Partial<Record<DeviceStoreErrorCodeValue, [ErrorCodeValue, number]>> = {
  [DeviceStoreErrorCode.UNSUPPORTED_SOURCE]: [ErrorCode.UNSUPPORTED_SOURCE, 400],
  [DeviceStoreErrorCode.INVALID_PROJECTION]: [ErrorCode.INVALID_PROJECTION, 400],
  [DeviceStoreErrorCode.QUERY_FAILED]: [ErrorCode.QUERY_FAILED, 500],
};

export function errorHandler(
  err: Error & { status?: number; statusCode?: number; type?: string },
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (res.headersSent) {
    return;
  }

  let statusCode = err.status || err.statusCode || 500;
  let code: ErrorCodeValue = ErrorCode.INTERNAL_ERROR;

  const mapped = isDeviceStoreError(err) ? STORE_ERROR_STATUS[err.code] : undefined;
  if (mapped) {
    [code, statusCode] = mapped;
  } else if (err.type === "entity.too.large") {
    statusCode = 413;
    code = ErrorCode.PAYLOAD_TOO_LARGE;
  } else if (err.type === "entity.parse.failed") {
    code = ErrorCode.INVALID_PARAM;
  }

  // Client never sees internal details (SQL, connection strings) on 5xx
  log.http.error({ err: err.message, code, requestId: res.locals._requestId }, "request failed");
  const clientMessage = statusCode >= 500 ? "Internal server error" : err.message;
  sendFail(res, code, clientMessage, statusCode);
}
