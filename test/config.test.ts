/**
 * config.test.ts — Environment-driven configuration.
 */

import { describe, it, expect } from "vitest";
import { resolveConfig, DEFAULT_DATABASE_URL } from "../src/server/config.js";

describe("resolveConfig", () => {
  it("applies defaults in production", () => {
    const config = resolveConfig({ NODE_ENV: "production" });
    expect(config).toEqual({
      port: 3000,
      isTest: false,
      databaseDriver: "postgres",
      databaseUrl: DEFAULT_DATABASE_URL,
      connectMaxAttempts: 20,
      connectBackoffMs: 1000,
      logLevel: "info",
      logPretty: false,
    });
  });

  it("treats a missing NODE_ENV as development", () => {
    const config = resolveConfig({});
    expect(config.isTest).toBe(false);
    expect(config.logLevel).toBe("debug");
    expect(config.logPretty).toBe(true);
  });

  it("detects test mode from VITEST", () => {
    const config = resolveConfig({ NODE_ENV: "development", VITEST: "true" });
    expect(config.isTest).toBe(true);
    expect(config.logLevel).toBe("silent");
    expect(config.logPretty).toBe(false);
  });

  it("reads database settings", () => {
    const config = resolveConfig({
      NODE_ENV: "production",
      DATABASE_DRIVER: "mysql",
      DATABASE_URL: "postgres://inv:test-secret@db:5432/inventory",
      DATABASE_CONNECT_ATTEMPTS: "5",
      DATABASE_CONNECT_BACKOFF_MS: "250",
    });
    expect(config.databaseDriver).toBe("mysql");
    expect(config.databaseUrl).toBe("postgres://inv:test-secret@db:5432/inventory");
    expect(config.connectMaxAttempts).toBe(5);
    expect(config.connectBackoffMs).toBe(250);
  });

  it("falls back on malformed numbers", () => {
    const config = resolveConfig({
      NODE_ENV: "production",
      DATABASE_CONNECT_ATTEMPTS: "lots",
      DATABASE_CONNECT_BACKOFF_MS: "0",
      PORT: "-1",
    });
    expect(config.connectMaxAttempts).toBe(20);
    expect(config.connectBackoffMs).toBe(1000);
    expect(config.port).toBe(3000);
  });

  it("prefers DEVICE_STORE_PORT over PORT", () => {
    expect(resolveConfig({ PORT: "8080" }).port).toBe(8080);
    expect(resolveConfig({ PORT: "8080", DEVICE_STORE_PORT: "9090" }).port).toBe(9090);
  });

  it("honours explicit log settings", () => {
    expect(resolveConfig({ NODE_ENV: "production", DEVICE_STORE_LOG_LEVEL: "warn" }).logLevel).toBe("warn");
    expect(resolveConfig({ NODE_ENV: "production", DEVICE_STORE_DEBUG: "true" }).logLevel).toBe("debug");
    expect(resolveConfig({ NODE_ENV: "production", DEVICE_STORE_DEBUG: "0" }).logLevel).toBe("info");
    expect(resolveConfig({ NODE_ENV: "development", DEVICE_STORE_LOG_PRETTY: "false" }).logPretty).toBe(false);
    expect(resolveConfig({ NODE_ENV: "production", DEVICE_STORE_LOG_PRETTY: "true" }).logPretty).toBe(true);
  });
});
