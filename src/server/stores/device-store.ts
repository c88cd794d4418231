/**
 * device-store.ts — Device inventory persistence
 *
 * One canonical row per physical device, keyed by serial number. Two
 * sources write to it independently:
 *   - "fetch"        provisioning facts from the assignment feed
 *   - "authenticate" enrollment facts reported by the device
 *
 * Each merge is a single INSERT … ON CONFLICT statement, so concurrent
 * merges for the same serial number never lose either fact set. A merge
 * only sets its own columns; the other source's columns are left alone.
 *
 * Pattern:
 *   const store = await openDeviceStore({ driver: "postgres", connectionString });
 *   const uuid = await store.createOrMerge("fetch", { serialNumber: "C02X", model: "Mac" });
 *   const device = await store.getDeviceByUdid(udid, ["model", "udid"]);
 *   const all = await store.listDevices(byWorkflow(id));
 */

import { initSchema, createPool as createPgPool, healthCheck, ping, redactUrl, type Pool } from "../db.js";
import { log, type Logger } from "../logger.js";
import { linearBackoff, retry, RetryExhaustedError, type RetryPolicy } from "../retry.js";
import { DeviceStoreError, DeviceStoreErrorCode, errorMessage } from "../errors.js";
import { composeWhere, matchesNothing } from "./device-filters.js";
import {
  DEVICE_COLUMNS,
  isDeviceColumn,
  isMergeSource,
  type Device,
  type DeviceColumn,
  type DeviceFacts,
  type DeviceRow,
  type DeviceSummary,
  type EnrollmentFacts,
  type ProvisioningFacts,
} from "../types/device-types.js";

// ─── Schema ─────────────────────────────────────────────────────

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`,
  `CREATE TABLE IF NOT EXISTS devices (
    device_uuid uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
    udid text NOT NULL DEFAULT '',
    serial_number text,
    os_version text,
    model text,
    color text,
    asset_tag text,
    dep_profile_status text,
    dep_profile_uuid text,
    dep_profile_assign_time date,
    dep_profile_push_time date,
    dep_profile_assigned_date date,
    dep_profile_assigned_by text,
    description text,
    build_version text,
    product_name text,
    imei text,
    meid text,
    apple_mdm_token text,
    apple_mdm_topic text,
    apple_push_magic text,
    mdm_enrolled boolean,
    workflow_uuid text NOT NULL DEFAULT '',
    dep_device boolean,
    awaiting_configuration boolean
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS serial_idx ON devices (serial_number)`,
  // Not unique: every unenrolled row carries udid ''
  `CREATE INDEX IF NOT EXISTS udid_idx ON devices (udid)`,
];

// ─── SQL ────────────────────────────────────────────────────────

const SQL = {
  mergeProvisioning: `INSERT INTO devices (
      serial_number, model, description, color, asset_tag,
      dep_profile_status, dep_profile_uuid, dep_profile_assign_time,
      dep_profile_push_time, dep_profile_assigned_date, dep_profile_assigned_by,
      dep_device
    )
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
    ON CONFLICT (serial_number) DO UPDATE SET
      model = $2,
      description = $3,
      color = $4,
      asset_tag = $5,
      dep_profile_status = $6,
      dep_profile_uuid = $7,
      dep_profile_assign_time = $8,
      dep_profile_push_time = $9,
      dep_profile_assigned_date = $10,
      dep_profile_assigned_by = $11,
      dep_device = $12
    RETURNING device_uuid`,
  mergeEnrollment: `INSERT INTO devices (
      udid, apple_mdm_topic, os_version, build_version, product_name,
      serial_number, imei, meid
    )
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
    ON CONFLICT (serial_number) DO UPDATE SET
      udid = $1,
      apple_mdm_topic = $2,
      os_version = $3,
      build_version = $4,
      product_name = $5,
      serial_number = $6,
      imei = $7,
      meid = $8
    RETURNING device_uuid`,
  listDevices: `SELECT device_uuid, udid, serial_number, dep_profile_status, model, workflow_uuid
    FROM devices`,
};

// ─── Types ──────────────────────────────────────────────────────

type SummaryRow = Pick<
  DeviceRow,
  "device_uuid" | "udid" | "serial_number" | "dep_profile_status" | "model" | "workflow_uuid"
>;

export interface DeviceStore {
  /** Dispatch on source tag; throws UNSUPPORTED_SOURCE for anything else. */
  createOrMerge(source: string, facts: DeviceFacts): Promise<string>;
  mergeProvisioning(facts: ProvisioningFacts): Promise<string>;
  mergeEnrollment(facts: EnrollmentFacts): Promise<string>;
  getDeviceByUdid(udid: string, fields?: readonly string[]): Promise<Partial<Device> | null>;
  /** Non-filter arguments are ignored. */
  listDevices(...params: unknown[]): Promise<DeviceSummary[]>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

export interface OpenDeviceStoreOptions {
  driver: string;
  connectionString: string;
  logger?: Logger;
  retry?: RetryPolicy;
  createPool?: (connectionString: string) => Pool;
}

// ─── Helpers ────────────────────────────────────────────────────

/** Convert a (possibly projected) row to a device with only the selected fields. */
function rowToDevice(row: Partial<DeviceRow>): Partial<Device> {
  const d: Partial<Device> = {};
  if (row.device_uuid !== undefined) d.uuid = row.device_uuid;
  if (row.udid !== undefined) d.udid = row.udid;
  if (row.serial_number !== undefined) d.serialNumber = row.serial_number;
  if (row.os_version !== undefined) d.osVersion = row.os_version;
  if (row.model !== undefined) d.model = row.model;
  if (row.color !== undefined) d.color = row.color;
  if (row.asset_tag !== undefined) d.assetTag = row.asset_tag;
  if (row.dep_profile_status !== undefined) d.depProfileStatus = row.dep_profile_status;
  if (row.dep_profile_uuid !== undefined) d.depProfileUuid = row.dep_profile_uuid;
  if (row.dep_profile_assign_time !== undefined) d.depProfileAssignTime = row.dep_profile_assign_time;
  if (row.dep_profile_push_time !== undefined) d.depProfilePushTime = row.dep_profile_push_time;
  if (row.dep_profile_assigned_date !== undefined) d.depProfileAssignedDate = row.dep_profile_assigned_date;
  if (row.dep_profile_assigned_by !== undefined) d.depProfileAssignedBy = row.dep_profile_assigned_by;
  if (row.description !== undefined) d.description = row.description;
  if (row.build_version !== undefined) d.buildVersion = row.build_version;
  if (row.product_name !== undefined) d.productName = row.product_name;
  if (row.imei !== undefined) d.imei = row.imei;
  if (row.meid !== undefined) d.meid = row.meid;
  if (row.apple_mdm_token !== undefined) d.mdmToken = row.apple_mdm_token;
  if (row.apple_mdm_topic !== undefined) d.mdmTopic = row.apple_mdm_topic;
  if (row.apple_push_magic !== undefined) d.pushMagic = row.apple_push_magic;
  if (row.mdm_enrolled !== undefined) d.mdmEnrolled = row.mdm_enrolled;
  if (row.workflow_uuid !== undefined) d.workflowUuid = row.workflow_uuid;
  if (row.dep_device !== undefined) d.depDevice = row.dep_device;
  if (row.awaiting_configuration !== undefined) d.awaitingConfiguration = row.awaiting_configuration;
  return d;
}

function rowToSummary(row: SummaryRow): DeviceSummary {
  return {
    uuid: row.device_uuid,
    udid: row.udid,
    serialNumber: row.serial_number,
    depProfileStatus: row.dep_profile_status,
    model: row.model,
    workflowUuid: row.workflow_uuid,
  };
}

/** Validate a caller projection against the column catalogue. Empty → all columns. */
function resolveProjection(fields: readonly string[] | undefined): readonly DeviceColumn[] {
  if (!fields || fields.length === 0) return DEVICE_COLUMNS;
  const unknown = fields.filter((f) => !isDeviceColumn(f));
  if (unknown.length > 0) {
    throw new DeviceStoreError(
      DeviceStoreErrorCode.INVALID_PROJECTION,
      `unknown device column(s): ${unknown.join(", ")}`,
    );
  }
  return fields.filter(isDeviceColumn);
}

function returnedUuid(rows: Array<{ device_uuid: string }>, source: string): string {
  const row = rows[0];
  if (!row) throw new Error(`device ${source} merge returned no row`);
  return row.device_uuid;
}

// ─── Schema Bootstrap ───────────────────────────────────────────

/**
 * Create the extension, table and indexes if absent. Safe on every boot.
 * Failures are structural, so they are wrapped and never retried.
 */
export async function ensureDeviceSchema(pool: Pool): Promise<void> {
  try {
    await initSchema(pool, SCHEMA_STATEMENTS);
  } catch (err) {
    throw new DeviceStoreError(
      DeviceStoreErrorCode.SCHEMA_MIGRATION_FAILED,
      `device schema migration failed: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

// ─── Factory ────────────────────────────────────────────────────

/** Build a store over a reachable pool, ensuring the schema first. */
export async function createDeviceStore(pool: Pool): Promise<DeviceStore> {
  await ensureDeviceSchema(pool);
  log.devices.debug("device store initialized (pg)");

  const store: DeviceStore = {
    async createOrMerge(source, facts) {
      if (!isMergeSource(source)) {
        throw new DeviceStoreError(
          DeviceStoreErrorCode.UNSUPPORTED_SOURCE,
          `datastore command not supported "${source}"`,
        );
      }
      return source === "fetch"
        ? store.mergeProvisioning(facts)
        : store.mergeEnrollment(facts);
    },

    async mergeProvisioning(facts) {
      const res = await pool.query<{ device_uuid: string }>(SQL.mergeProvisioning, [
        facts.serialNumber,
        facts.model ?? null,
        facts.description ?? null,
        facts.color ?? null,
        facts.assetTag ?? null,
        facts.depProfileStatus ?? null,
        facts.depProfileUuid ?? null,
        facts.depProfileAssignTime ?? null,
        facts.depProfilePushTime ?? null,
        facts.depProfileAssignedDate ?? null,
        facts.depProfileAssignedBy ?? null,
        true,
      ]);
      const uuid = returnedUuid(res.rows, "fetch");
      log.devices.debug({ serialNumber: facts.serialNumber, uuid }, "provisioning facts merged");
      return uuid;
    },

    async mergeEnrollment(facts) {
      const res = await pool.query<{ device_uuid: string }>(SQL.mergeEnrollment, [
        facts.udid ?? "",
        facts.mdmTopic ?? null,
        facts.osVersion ?? null,
        facts.buildVersion ?? null,
        facts.productName ?? null,
        facts.serialNumber,
        facts.imei ?? null,
        facts.meid ?? null,
      ]);
      const uuid = returnedUuid(res.rows, "authenticate");
      log.devices.debug({ serialNumber: facts.serialNumber, uuid }, "enrollment facts merged");
      return uuid;
    },

    async getDeviceByUdid(udid, fields) {
      const columns = resolveProjection(fields);
      if (udid === "") return null;
      const sql = `SELECT ${columns.join(", ")} FROM devices WHERE udid = $1 LIMIT 1`;
      try {
        const res = await pool.query<Partial<DeviceRow>>(sql, [udid]);
        const row = res.rows[0];
        return row ? rowToDevice(row) : null;
      } catch (err) {
        throw new DeviceStoreError(
          DeviceStoreErrorCode.QUERY_FAILED,
          `get device by udid: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    },

    async listDevices(...params) {
      if (matchesNothing(params)) return [];
      const { sql, values } = composeWhere(SQL.listDevices, params);
      try {
        const res = await pool.query<SummaryRow>(sql, values);
        return res.rows.map(rowToSummary);
      } catch (err) {
        throw new DeviceStoreError(
          DeviceStoreErrorCode.QUERY_FAILED,
          `list devices: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    },

    healthCheck() {
      return healthCheck(pool);
    },

    async close() {
      await pool.end();
    },
  };

  return store;
}

/**
 * Open a pool for `driver`, wait until the store answers, then ensure the
 * schema. The returned store owns the pool.
 */
export async function openDeviceStore(options: OpenDeviceStoreOptions): Promise<DeviceStore> {
  const { driver, connectionString } = options;
  if (driver !== "postgres") {
    throw new DeviceStoreError(DeviceStoreErrorCode.UNKNOWN_DRIVER, `unknown driver "${driver}"`);
  }

  const logger = options.logger ?? log.db;
  const policy = options.retry ?? linearBackoff();
  const pool = (options.createPool ?? createPgPool)(connectionString);

  try {
    await retry(policy, () => ping(pool), (err, attempt) => {
      logger.warn(
        { attempt, maxAttempts: policy.maxAttempts, err: errorMessage(err) },
        `could not connect to postgres: ${errorMessage(err)}`,
      );
    });
  } catch (err) {
    await pool.end();
    throw new DeviceStoreError(
      DeviceStoreErrorCode.CONNECTIVITY_EXHAUSTED,
      `device datastore: postgres unreachable at ${redactUrl(connectionString)} after ${policy.maxAttempts} attempts`,
      { cause: err instanceof RetryExhaustedError ? err.lastError : err },
    );
  }
  logger.info({ url: redactUrl(connectionString) }, "postgres reachable");

  try {
    return await createDeviceStore(pool);
  } catch (err) {
    await pool.end();
    throw err;
  }
}
