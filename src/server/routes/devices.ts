/**
 * routes/devices.ts — Device inventory API
 *
 * Endpoints:
 *   GET  /api/devices                 — List, filtered by ?uuid= &udid= &serial= &workflow= &dep=
 *   GET  /api/devices/udid/:udid      — One device by UDID, ?fields=model,udid
 *   POST /api/devices/:source         — Merge facts ("fetch" | "authenticate"), returns { uuid }
 *
 * Pattern: factory function createDeviceRoutes(appState) → Router
 */

import type { Request, Response, Router } from "express";
import type { AppState } from "../app-context.js";
import type { DeviceStore } from "../stores/device-store.js";
import type { DeviceFacts } from "../types/device-types.js";
import { sendOk, sendFail, ErrorCode } from "../envelope.js";
import { createSafeRouter } from "../safe-router.js";
import {
  byDepDevice,
  bySerialNumber,
  byUdid,
  byUuid,
  byWorkflow,
  isUuid,
  type DeviceFilter,
} from "../stores/device-filters.js";

// ─── Body Parsing ───────────────────────────────────────────────

/** Optional nullable string fields shared by both fact sets. */
const NULLABLE_FIELDS = [
  "model",
  "description",
  "color",
  "assetTag",
  "depProfileStatus",
  "depProfileUuid",
  "depProfileAssignTime",
  "depProfilePushTime",
  "depProfileAssignedDate",
  "depProfileAssignedBy",
  "mdmTopic",
  "osVersion",
  "buildVersion",
  "productName",
  "imei",
  "meid",
] as const;

/** Nullable fields that must parse as a date when present. */
const DATE_FIELDS: ReadonlySet<string> = new Set([
  "depProfileAssignTime",
  "depProfilePushTime",
  "depProfileAssignedDate",
]);

export type ParseResult =
  | { ok: true; facts: DeviceFacts }
  | { ok: false; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Validate a JSON request body into a fact payload. */
export function parseFacts(body: unknown): ParseResult {
  if (!isRecord(body)) return { ok: false, message: "Body must be a JSON object" };

  const serialNumber = body.serialNumber;
  if (typeof serialNumber !== "string" || serialNumber.trim() === "") {
    return { ok: false, message: "serialNumber must be a non-empty string" };
  }
  const facts: DeviceFacts = { serialNumber };

  for (const field of NULLABLE_FIELDS) {
    const value = body[field];
    if (value === undefined) continue;
    if (typeof value === "string" && DATE_FIELDS.has(field) && Number.isNaN(Date.parse(value))) {
      return { ok: false, message: `${field} must be a date` };
    }
    if (value === null || typeof value === "string") {
      facts[field] = value;
      continue;
    }
    return { ok: false, message: `${field} must be a string or null` };
  }

  if (body.udid !== undefined) {
    if (typeof body.udid !== "string") return { ok: false, message: "udid must be a string" };
    facts.udid = body.udid;
  }
  return { ok: true, facts };
}

/** Single string query param; repeated params are rejected. */
function queryString(req: Request, name: string): string | undefined | null {
  const raw = req.query[name];
  if (raw === undefined) return undefined;
  return typeof raw === "string" ? raw : null;
}

// ─── Routes ─────────────────────────────────────────────────────

export function createDeviceRoutes(appState: AppState): Router {
  const safe = createSafeRouter();

  /** Guard: return device store or 503 */
  function getStore(res: Response): DeviceStore | null {
    if (!appState.deviceStore) {
      sendFail(res, ErrorCode.DATABASE_UNAVAILABLE, "Device store not available", 503);
      return null;
    }
    return appState.deviceStore;
  }

  safe.get("/api/devices", async (req, res) => {
    const store = getStore(res);
    if (!store) return;

    const filters: DeviceFilter[] = [];
    const params: Array<[string, (v: string) => DeviceFilter]> = [
      ["uuid", byUuid],
      ["udid", byUdid],
      ["serial", bySerialNumber],
      ["workflow", byWorkflow],
    ];
    for (const [name, make] of params) {
      const value = queryString(req, name);
      if (value === null) return sendFail(res, ErrorCode.INVALID_PARAM, `${name} must be given once`, 400);
      if (value === undefined) continue;
      if (name === "uuid" && !isUuid(value)) {
        return sendFail(res, ErrorCode.INVALID_PARAM, "uuid must be a UUID", 400);
      }
      filters.push(make(value));
    }
    const dep = queryString(req, "dep");
    if (dep !== undefined) {
      if (dep !== "true" && dep !== "false") {
        return sendFail(res, ErrorCode.INVALID_PARAM, "dep must be true or false", 400);
      }
      filters.push(byDepDevice(dep === "true"));
    }

    const devices = await store.listDevices(...filters);
    sendOk(res, { devices, count: devices.length });
  });

  safe.get("/api/devices/udid/:udid", async (req, res) => {
    const store = getStore(res);
    if (!store) return;
    const fieldsParam = queryString(req, "fields");
    if (fieldsParam === null) return sendFail(res, ErrorCode.INVALID_PARAM, "fields must be given once", 400);
    const fields = fieldsParam
      ? fieldsParam.split(",").map((f) => f.trim()).filter((f) => f.length > 0)
      : [];

    const device = await store.getDeviceByUdid(req.params.udid, fields);
    if (!device) return sendFail(res, ErrorCode.NOT_FOUND, `No device with udid ${req.params.udid}`, 404);
    sendOk(res, { device });
  });

  safe.post("/api/devices/:source", async (req, res) => {
    const store = getStore(res);
    if (!store) return;
    const parsed = parseFacts(req.body);
    if (!parsed.ok) return sendFail(res, ErrorCode.INVALID_PARAM, parsed.message, 400);

    const uuid = await store.createOrMerge(req.params.source, parsed.facts);
    sendOk(res, { uuid });
  });

  return safe.router;
}
