/**
 * errors.ts — Device store error taxonomy.
 *
 * Configuration errors (UNKNOWN_DRIVER, UNSUPPORTED_SOURCE, INVALID_PROJECTION)
 * are caller mistakes and never retried. CONNECTIVITY_EXHAUSTED and
 * SCHEMA_MIGRATION_FAILED are fatal to startup. QUERY_FAILED wraps a read
 * failure after bootstrap; retry policy belongs to the caller.
 */

export const DeviceStoreErrorCode = {
  UNKNOWN_DRIVER: "UNKNOWN_DRIVER",
  UNSUPPORTED_SOURCE: "UNSUPPORTED_SOURCE",
  INVALID_PROJECTION: "INVALID_PROJECTION",
  CONNECTIVITY_EXHAUSTED: "CONNECTIVITY_EXHAUSTED",
  SCHEMA_MIGRATION_FAILED: "SCHEMA_MIGRATION_FAILED",
  QUERY_FAILED: "QUERY_FAILED",
} as const;

export type DeviceStoreErrorCodeValue =
  (typeof DeviceStoreErrorCode)[keyof typeof DeviceStoreErrorCode];

export class DeviceStoreError extends Error {
  readonly code: DeviceStoreErrorCodeValue;

  constructor(code: DeviceStoreErrorCodeValue, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeviceStoreError";
    this.code = code;
  }
}

export function isDeviceStoreError(err: unknown): err is DeviceStoreError {
  return err instanceof DeviceStoreError;
}

/** Message of an unknown thrown value, for log lines and wrapped errors. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
