/**
 * app-context.ts — Shared state for the server and its route modules.
 *
 * Kept apart from index.ts so routes can import the type without pulling
 * in the boot sequence.
 */

import type { AppConfig } from "./config.js";
import type { DeviceStore } from "./stores/device-store.js";

export interface AppState {
  config: AppConfig;
  /** Null until the store has connected and ensured its schema. */
  deviceStore: DeviceStore | null;
  startupComplete: boolean;
}

export function createAppState(config: AppConfig, deviceStore: DeviceStore | null = null): AppState {
  return { config, deviceStore, startupComplete: deviceStore !== null };
}
