/**
 * index.ts — Device inventory server (thin shell)
 *
 * App factory + boot sequence. Route handlers live in src/server/routes/*.ts.
 *
 * Endpoints:
 *   GET  /api/health                — Status check
 *   GET  /api/devices               — Filtered device list
 *   GET  /api/devices/udid/:udid    — Device by UDID with column projection
 *   POST /api/devices/:source       — Merge provisioning or enrollment facts
 */

import express from "express";
import type { IncomingMessage } from "node:http";
import { pinoHttp } from "pino-http";
import { log, rootLogger } from "./logger.js";
import { resolveConfig } from "./config.js";
import { createAppState, type AppState } from "./app-context.js";
import { envelopeMiddleware, errorHandler, sendFail, ErrorCode } from "./envelope.js";
import { errorMessage } from "./errors.js";
import { linearBackoff } from "./retry.js";
import { redactUrl } from "./db.js";
import { openDeviceStore } from "./stores/device-store.js";
import { createCoreRoutes } from "./routes/core.js";
import { createDeviceRoutes } from "./routes/devices.js";

export type { AppState };

export function createApp(appState: AppState): express.Express {
  const app = express();

  app.use(envelopeMiddleware);
  app.use(express.json({ limit: "100kb" }));

  app.use(
    pinoHttp({
      logger: rootLogger,
      autoLogging: {
        ignore: (req: IncomingMessage) => (req.url || "").startsWith("/api/health"),
      },
    }),
  );

  app.use(createCoreRoutes(appState));
  app.use(createDeviceRoutes(appState));

  app.use("/api", (_req, res) => {
    sendFail(res, ErrorCode.NOT_FOUND, "Unknown endpoint", 404);
  });

  app.use(errorHandler);

  return app;
}

// ─── Boot ───────────────────────────────────────────────────────

const state = createAppState(resolveConfig());

async function boot(): Promise<void> {
  const { config } = state;
  log.boot.info({ url: redactUrl(config.databaseUrl), driver: config.databaseDriver }, "device inventory initializing");

  // Fatal on failure: connectivity exhausted or schema migration failed
  state.deviceStore = await openDeviceStore({
    driver: config.databaseDriver,
    connectionString: config.databaseUrl,
    logger: log.db,
    retry: linearBackoff({
      maxAttempts: config.connectMaxAttempts,
      unitMs: config.connectBackoffMs,
    }),
  });
  state.startupComplete = true;
  log.boot.info("device store online");

  const app = createApp(state);
  app.listen(config.port, () => {
    log.boot.info({ port: config.port, url: `http://localhost:${config.port}` }, "device inventory online");
  });
}

// ─── Graceful Shutdown ──────────────────────────────────────────

async function shutdown(): Promise<void> {
  log.boot.info("device inventory shutting down");
  if (state.deviceStore) {
    await state.deviceStore.close();
  }
  process.exit(0);
}

function onSignal(): void {
  shutdown().catch((err) => {
    log.boot.error({ err: errorMessage(err) }, "shutdown failed");
    process.exit(1);
  });
}

// ─── Launch (guarded for test imports) ──────────────────────────
if (!state.config.isTest) {
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  boot().catch((err) => {
    log.boot.fatal({ err: errorMessage(err), cause: err instanceof Error && err.cause !== undefined ? errorMessage(err.cause) : undefined }, "fatal startup error");
    process.exit(1);
  });
}
