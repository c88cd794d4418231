/**
 * device-filters.ts — Typed filters for device list queries.
 *
 * Each filter renders to one `<column> = $n` fragment. Column names come
 * from this file only; every caller-supplied value is bound as a parameter.
 *
 *   const { sql, values } = composeWhere(BASE, [byUuid(id), "ignored"]);
 *   await pool.query(sql, values);
 */

export type DeviceFilter =
  | { kind: "uuid"; uuid: string }
  | { kind: "udid"; udid: string }
  | { kind: "serialNumber"; serialNumber: string }
  | { kind: "workflow"; workflowUuid: string }
  | { kind: "depDevice"; depDevice: boolean };

export const byUuid = (uuid: string): DeviceFilter => ({ kind: "uuid", uuid });
export const byUdid = (udid: string): DeviceFilter => ({ kind: "udid", udid });
export const bySerialNumber = (serialNumber: string): DeviceFilter => ({ kind: "serialNumber", serialNumber });
export const byWorkflow = (workflowUuid: string): DeviceFilter => ({ kind: "workflow", workflowUuid });
export const byDepDevice = (depDevice: boolean): DeviceFilter => ({ kind: "depDevice", depDevice });

export interface RenderedFragment {
  fragment: string;
  values: unknown[];
}

export interface ComposedQuery {
  sql: string;
  values: unknown[];
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Canonical hyphenated UUID text, any case. */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Narrow an arbitrary argument to a filter. Anything else is not a filter. */
export function isDeviceFilter(value: unknown): value is DeviceFilter {
  if (!isRecord(value)) return false;
  switch (value.kind) {
    case "uuid": return typeof value.uuid === "string";
    case "udid": return typeof value.udid === "string";
    case "serialNumber": return typeof value.serialNumber === "string";
    case "workflow": return typeof value.workflowUuid === "string";
    case "depDevice": return typeof value.depDevice === "boolean";
    default: return false;
  }
}

/**
 * True when some filter can never match a row: a surrogate id that is not a
 * UUID. `device_uuid` is a uuid column, so binding such text would fail the
 * cast instead of matching nothing.
 */
export function matchesNothing(params: readonly unknown[]): boolean {
  return params.some((param) => isDeviceFilter(param) && param.kind === "uuid" && !isUuid(param.uuid));
}

/** Render one filter against the given placeholder index. */
export function renderFilter(filter: DeviceFilter, index: number): RenderedFragment {
  const p = `$${index}`;
  switch (filter.kind) {
    case "uuid": return { fragment: `device_uuid = ${p}`, values: [filter.uuid] };
    case "udid": return { fragment: `udid = ${p}`, values: [filter.udid] };
    case "serialNumber": return { fragment: `serial_number = ${p}`, values: [filter.serialNumber] };
    case "workflow": return { fragment: `workflow_uuid = ${p}`, values: [filter.workflowUuid] };
    case "depDevice": return { fragment: `dep_device = ${p}`, values: [filter.depDevice] };
  }
}

/**
 * Append a WHERE clause built from every filter in `params`.
 * Non-filter params are skipped. No filters → `baseSql` unchanged.
 */
export function composeWhere(
  baseSql: string,
  params: readonly unknown[],
  startIndex = 1,
): ComposedQuery {
  const fragments: string[] = [];
  const values: unknown[] = [];
  for (const param of params) {
    if (!isDeviceFilter(param)) continue;
    const rendered = renderFilter(param, startIndex + values.length);
    fragments.push(rendered.fragment);
    values.push(...rendered.values);
  }
  if (fragments.length === 0) {
    return { sql: baseSql, values };
  }
  return { sql: `${baseSql} WHERE ${fragments.join(" AND ")}`, values };
}
