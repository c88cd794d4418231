/**
 * device-routes.test.ts — HTTP surface over the device store.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import request from "supertest";
import { createApp } from "../src/server/index.js";
import { createAppState } from "../src/server/app-context.js";
import { resolveConfig } from "../src/server/config.js";
import { createDeviceStore, type DeviceStore } from "../src/server/stores/device-store.js";
import { parseFacts } from "../src/server/routes/devices.js";
import { bySerialNumber } from "../src/server/stores/device-filters.js";
import { createTestDatabase, type Pool } from "./helpers/pg-test.js";

let pool: Pool;
let store: DeviceStore;
let app: ReturnType<typeof createApp>;

beforeEach(async () => {
  pool = createTestDatabase().createPool();
  store = await createDeviceStore(pool);
  app = createApp(createAppState(resolveConfig(), store));
});

describe("GET /api/health", () => {
  it("reports online with a reachable database", async () => {
    const res = await request(app).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.data).toEqual({ status: "online", database: "connected" });
    expect(res.headers["x-request-id"]).toBe(res.body.meta.requestId);
  });

  it("returns 503 while the store is initializing", async () => {
    const res = await request(createApp(createAppState(resolveConfig()))).get("/api/health");
    expect(res.status).toBe(503);
    expect(res.body.error).toEqual({
      code: "DATABASE_UNAVAILABLE",
      message: "Device store initializing",
      detail: { status: "initializing" },
    });
  });

  it("returns 503 when the database stops answering", async () => {
    vi.spyOn(pool, "query").mockRejectedValue(new Error("connection terminated"));
    const res = await request(app).get("/api/health");
    expect(res.status).toBe(503);
    expect(res.body.error.detail).toEqual({ database: "unreachable" });
  });
});

describe("POST /api/devices/:source", () => {
  it("merges both sources into one device", async () => {
    const fetched = await request(app).post("/api/devices/fetch").send({ serialNumber: "ABC123", model: "Widget" });
    expect(fetched.status).toBe(200);
    expect(fetched.body.data.uuid).toMatch(/^[0-9a-f-]{36}$/);

    const enrolled = await request(app).post("/api/devices/authenticate").send({ serialNumber: "ABC123", udid: "UDID-9" });
    expect(enrolled.status).toBe(200);
    expect(enrolled.body.data.uuid).toBe(fetched.body.data.uuid);
  });

  it("rejects unsupported sources", async () => {
    const res = await request(app).post("/api/devices/delete").send({ serialNumber: "ABC123" });
    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      code: "UNSUPPORTED_SOURCE",
      message: 'datastore command not supported "delete"',
    });
    expect(await store.listDevices()).toEqual([]);
  });

  it("rejects a body without a serial number", async () => {
    const res = await request(app).post("/api/devices/fetch").send({ model: "Widget" });
    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: "INVALID_PARAM", message: "serialNumber must be a non-empty string" });
  });

  it("rejects malformed JSON", async () => {
    const res = await request(app)
      .post("/api/devices/fetch")
      .set("Content-Type", "application/json")
      .send("{not json");
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("INVALID_PARAM");
  });

  it("rejects an unparseable date before writing", async () => {
    const res = await request(app)
      .post("/api/devices/fetch")
      .send({ serialNumber: "S2", depProfileAssignTime: "yesterday-ish" });
    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: "INVALID_PARAM", message: "depProfileAssignTime must be a date" });
    expect(await store.listDevices()).toEqual([]);
  });

  it("hides write failure details", async () => {
    vi.spyOn(pool, "query").mockRejectedValueOnce(new Error("duplicate key value violates unique constraint"));
    const res = await request(app).post("/api/devices/fetch").send({ serialNumber: "ABC123" });
    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
  });
});

describe("GET /api/devices/udid/:udid", () => {
  beforeEach(async () => {
    await store.createOrMerge("fetch", { serialNumber: "ABC123", model: "Widget" });
    await store.createOrMerge("authenticate", { serialNumber: "ABC123", udid: "UDID-9" });
  });

  it("returns the projected columns", async () => {
    const res = await request(app).get("/api/devices/udid/UDID-9?fields=model,udid");
    expect(res.status).toBe(200);
    expect(res.body.data.device).toEqual({ model: "Widget", udid: "UDID-9" });
  });

  it("returns 404 for an unknown udid", async () => {
    const res = await request(app).get("/api/devices/udid/UDID-0");
    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: "NOT_FOUND", message: "No device with udid UDID-0" });
  });

  it("returns 400 for unknown columns", async () => {
    const res = await request(app).get("/api/devices/udid/UDID-9?fields=model,secret_sauce");
    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      code: "INVALID_PROJECTION",
      message: "unknown device column(s): secret_sauce",
    });
  });
});

describe("GET /api/devices", () => {
  beforeEach(async () => {
    await store.createOrMerge("fetch", { serialNumber: "SER-1", model: "Widget" });
    await store.createOrMerge("authenticate", { serialNumber: "SER-2", udid: "UDID-2" });
  });

  it("lists every device", async () => {
    const res = await request(app).get("/api/devices");
    expect(res.status).toBe(200);
    expect(res.body.data.count).toBe(2);
  });

  it("applies query filters", async () => {
    const res = await request(app).get("/api/devices?serial=SER-2&udid=UDID-2");
    expect(res.body.data.count).toBe(1);
    expect(res.body.data.devices[0].serialNumber).toBe("SER-2");
  });

  it("filters on the provisioning flag", async () => {
    const res = await request(app).get("/api/devices?dep=true");
    expect(res.body.data.devices.map((d: { serialNumber: string }) => d.serialNumber)).toEqual(["SER-1"]);
  });

  it("rejects a malformed dep flag", async () => {
    const res = await request(app).get("/api/devices?dep=maybe");
    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("dep must be true or false");
  });

  it("rejects repeated filter params", async () => {
    const res = await request(app).get("/api/devices?uuid=a&uuid=b");
    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("uuid must be given once");
  });

  it("rejects a surrogate id that is not a UUID", async () => {
    const res = await request(app).get("/api/devices?uuid=not-a-uuid");
    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: "INVALID_PARAM", message: "uuid must be a UUID" });
  });

  it("finds a device by surrogate id", async () => {
    const [device] = await store.listDevices(bySerialNumber("SER-1"));
    const res = await request(app).get(`/api/devices?uuid=${device?.uuid ?? ""}`);
    expect(res.status).toBe(200);
    expect(res.body.data.devices.map((d: { serialNumber: string }) => d.serialNumber)).toEqual(["SER-1"]);
  });

  it("maps read failures to 500 QUERY_FAILED", async () => {
    vi.spyOn(pool, "query").mockRejectedValueOnce(new Error("connection terminated"));
    const res = await request(app).get("/api/devices");
    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({ code: "QUERY_FAILED", message: "Internal server error" });
  });
});

describe("unknown endpoints", () => {
  it("return a 404 envelope", async () => {
    const res = await request(app).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body.ok).toBe(false);
    expect(res.body.error.code).toBe("NOT_FOUND");
  });
});

describe("parseFacts", () => {
  it("keeps strings and nulls", () => {
    expect(parseFacts({ serialNumber: "S1", model: "Widget", color: null, udid: "U1", extra: 5 })).toEqual({
      ok: true,
      facts: { serialNumber: "S1", model: "Widget", color: null, udid: "U1" },
    });
  });

  it("rejects non-object bodies", () => {
    expect(parseFacts([])).toEqual({ ok: false, message: "Body must be a JSON object" });
    expect(parseFacts("S1")).toEqual({ ok: false, message: "Body must be a JSON object" });
  });

  it("rejects wrongly typed fields", () => {
    expect(parseFacts({ serialNumber: "S1", model: 5 })).toEqual({ ok: false, message: "model must be a string or null" });
    expect(parseFacts({ serialNumber: "S1", udid: null })).toEqual({ ok: false, message: "udid must be a string" });
    expect(parseFacts({ serialNumber: "  " })).toEqual({ ok: false, message: "serialNumber must be a non-empty string" });
  });

  it("checks date fields", () => {
    expect(parseFacts({ serialNumber: "S1", depProfilePushTime: "2024-03-01T10:00:00Z", depProfileAssignedDate: null }))
      .toEqual({
        ok: true,
        facts: { serialNumber: "S1", depProfilePushTime: "2024-03-01T10:00:00Z", depProfileAssignedDate: null },
      });
    expect(parseFacts({ serialNumber: "S1", depProfileAssignedDate: "" }))
      .toEqual({ ok: false, message: "depProfileAssignedDate must be a date" });
    expect(parseFacts({ serialNumber: "S1", depProfilePushTime: 1709287200 }))
      .toEqual({ ok: false, message: "depProfilePushTime must be a string or null" });
  });
});
