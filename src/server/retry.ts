/**
 * retry.ts — Bounded retry with pluggable backoff.
 *
 * Used by the connection bootstrapper; any startup step that waits on an
 * external dependency can share the same policy.
 *
 * Usage:
 *   const policy = linearBackoff({ maxAttempts: 20, unitMs: 1000 });
 *   await retry(policy, () => ping(pool), (err, attempt) => log.warn(...));
 */

import { setTimeout as delay } from "node:timers/promises";

export interface RetryPolicy {
  readonly maxAttempts: number;
  /** Delay after the given failed attempt (1-based), in milliseconds. */
  delayFor(attempt: number): number;
  sleep(ms: number): Promise<void>;
}

export interface LinearBackoffOptions {
  maxAttempts?: number;
  /** Delay unit; attempt n waits n units. */
  unitMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_MAX_ATTEMPTS = 20;
export const DEFAULT_BACKOFF_UNIT_MS = 1000;

async function defaultSleep(ms: number): Promise<void> {
  await delay(ms);
}

/** Linear backoff: 1, 2, 3, … units between attempts. */
export function linearBackoff(options: LinearBackoffOptions = {}): RetryPolicy {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const unitMs = options.unitMs ?? DEFAULT_BACKOFF_UNIT_MS;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  if (unitMs <= 0) {
    throw new RangeError(`unitMs must be positive, got ${unitMs}`);
  }
  return {
    maxAttempts,
    delayFor: (attempt) => attempt * unitMs,
    sleep: options.sleep ?? defaultSleep,
  };
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`gave up after ${attempts} attempts`, { cause: lastError });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Run `op` until it resolves or the policy's attempts run out.
 * `onFailure` sees every failed attempt, including the last one.
 * No sleep follows the final attempt.
 */
export async function retry<T>(
  policy: RetryPolicy,
  op: (attempt: number) => Promise<T>,
  onFailure?: (err: unknown, attempt: number) => void,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await op(attempt);
    } catch (err) {
      lastError = err;
      onFailure?.(err, attempt);
      if (attempt < policy.maxAttempts) {
        await policy.sleep(policy.delayFor(attempt));
      }
    }
  }
  throw new RetryExhaustedError(policy.maxAttempts, lastError);
}
