/**
 * routes/core.ts — Health check.
 */

import type { Router } from "express";
import type { AppState } from "../app-context.js";
import { sendOk, sendFail, ErrorCode } from "../envelope.js";
import { createSafeRouter } from "../safe-router.js";

export interface HealthResponse {
  status: "online";
  database: "connected";
}

export function createCoreRoutes(appState: AppState): Router {
  const safe = createSafeRouter();

  safe.get("/api/health", async (_req, res) => {
    const store = appState.deviceStore;
    if (!store || !appState.startupComplete) {
      return sendFail(res, ErrorCode.DATABASE_UNAVAILABLE, "Device store initializing", 503, { status: "initializing" });
    }
    if (!(await store.healthCheck())) {
      return sendFail(res, ErrorCode.DATABASE_UNAVAILABLE, "Database unreachable", 503, { database: "unreachable" });
    }
    const body: HealthResponse = { status: "online", database: "connected" };
    sendOk(res, body);
  });

  return safe.router;
}
