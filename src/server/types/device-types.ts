/**
 * device-types.ts — Device record, fact sets, and column catalogue.
 *
 * A device row is written by two independent sources. Provisioning facts
 * arrive from the assignment feed; enrollment facts arrive from the device
 * itself during the MDM handshake. Both share one row keyed by serial number.
 */

// ─── Merge Sources ──────────────────────────────────────────────

export const MERGE_SOURCES = ["fetch", "authenticate"] as const;
export type MergeSource = (typeof MERGE_SOURCES)[number];

export function isMergeSource(value: string): value is MergeSource {
  return MERGE_SOURCES.some((source) => source === value);
}

// ─── Canonical Record ───────────────────────────────────────────

export interface Device {
  uuid: string;
  udid: string;
  serialNumber: string | null;
  osVersion: string | null;
  model: string | null;
  color: string | null;
  assetTag: string | null;
  depProfileStatus: string | null;
  depProfileUuid: string | null;
  depProfileAssignTime: Date | null;
  depProfilePushTime: Date | null;
  depProfileAssignedDate: Date | null;
  depProfileAssignedBy: string | null;
  description: string | null;
  buildVersion: string | null;
  productName: string | null;
  imei: string | null;
  meid: string | null;
  mdmToken: string | null;
  mdmTopic: string | null;
  pushMagic: string | null;
  mdmEnrolled: boolean | null;
  workflowUuid: string;
  depDevice: boolean | null;
  awaitingConfiguration: boolean | null;
}

/** Projection used by list queries. */
export type DeviceSummary = Pick<
  Device,
  "uuid" | "udid" | "serialNumber" | "depProfileStatus" | "model" | "workflowUuid"
>;

/** Raw row shape as returned by pg. */
export type DeviceRow = {
  device_uuid: string;
  udid: string;
  serial_number: string | null;
  os_version: string | null;
  model: string | null;
  color: string | null;
  asset_tag: string | null;
  dep_profile_status: string | null;
  dep_profile_uuid: string | null;
  dep_profile_assign_time: Date | null;
  dep_profile_push_time: Date | null;
  dep_profile_assigned_date: Date | null;
  dep_profile_assigned_by: string | null;
  description: string | null;
  build_version: string | null;
  product_name: string | null;
  imei: string | null;
  meid: string | null;
  apple_mdm_token: string | null;
  apple_mdm_topic: string | null;
  apple_push_magic: string | null;
  mdm_enrolled: boolean | null;
  workflow_uuid: string;
  dep_device: boolean | null;
  awaiting_configuration: boolean | null;
};

export type DeviceColumn = keyof DeviceRow;

/** Every selectable column, in table order. */
export const DEVICE_COLUMNS: readonly DeviceColumn[] = [
  "device_uuid",
  "udid",
  "serial_number",
  "os_version",
  "model",
  "color",
  "asset_tag",
  "dep_profile_status",
  "dep_profile_uuid",
  "dep_profile_assign_time",
  "dep_profile_push_time",
  "dep_profile_assigned_date",
  "dep_profile_assigned_by",
  "description",
  "build_version",
  "product_name",
  "imei",
  "meid",
  "apple_mdm_token",
  "apple_mdm_topic",
  "apple_push_magic",
  "mdm_enrolled",
  "workflow_uuid",
  "dep_device",
  "awaiting_configuration",
];

export function isDeviceColumn(value: string): value is DeviceColumn {
  return DEVICE_COLUMNS.some((column) => column === value);
}

// ─── Fact Sets ──────────────────────────────────────────────────

/** Date columns accept a Date or an ISO date string. */
export type DateInput = Date | string | null;

export interface ProvisioningFacts {
  serialNumber: string;
  model?: string | null;
  description?: string | null;
  color?: string | null;
  assetTag?: string | null;
  depProfileStatus?: string | null;
  depProfileUuid?: string | null;
  depProfileAssignTime?: DateInput;
  depProfilePushTime?: DateInput;
  depProfileAssignedDate?: DateInput;
  depProfileAssignedBy?: string | null;
}

export interface EnrollmentFacts {
  serialNumber: string;
  udid?: string;
  mdmTopic?: string | null;
  osVersion?: string | null;
  buildVersion?: string | null;
  productName?: string | null;
  imei?: string | null;
  meid?: string | null;
}

/** Payload accepted by createOrMerge: either fact set, keyed by serial number. */
export type DeviceFacts = ProvisioningFacts & Omit<EnrollmentFacts, "serialNumber">;
