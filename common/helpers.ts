// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LEASE_DEFAULTS } from "./constants.js";
import { LocksmithError } from "./errors.js";
import type { Lease } from "./lease.js";
import { logger } from "./logger.js";
import type { Locksmith, LockName, OnReleaseError } from "./types.js";

/**
 * Default handler for release failures in withLease(). Omits the lease id.
 */
const defaultReleaseErrorHandler: OnReleaseError = (err, ctx) => {
  logger.error("Lease release failed", {
    error: err.message,
    errorName: err.name,
    name: ctx.name,
  });
};

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** Options for withLease() */
export interface WithLeaseOptions {
  /** Lease validity in seconds (default: 30) */
  validity?: number;
  /** Acquire timeout in seconds, forwarded to the authority (default: wait as long as it does) */
  timeout?: number;
  /** Release failure callback; release errors never replace fn's result */
  onReleaseError?: OnReleaseError;
}

/**
 * Runs `fn` while holding `name`, then releases the lease.
 * Waiting for the lock is delegated to the authority via `timeout`.
 *
 * @param locksmith - Coordinator (plain or telemetry-wrapped)
 * @param name - Lock name
 * @param fn - Work to run while the lease is held
 * @returns Result of fn
 * @throws {LocksmithError} Locked when the lock could not be acquired
 * @example
 * ```typescript
 * const report = await withLease(locksmith, "reports:daily", async (lease) => {
 *   return buildReport();
 * }, { validity: 60, timeout: 5 });
 * ```
 */
export async function withLease<T>(
  locksmith: Locksmith,
  name: LockName,
  fn: (lease: Lease) => Promise<T> | T,
  options: WithLeaseOptions = {},
): Promise<T> {
  const validity = options.validity ?? LEASE_DEFAULTS.validity;
  const lease = await locksmith.acquire(name, validity, options.timeout);

  if (!lease) {
    throw new LocksmithError(
      "Locked",
      `Lock "${name}" is held by another owner`,
      { name },
    );
  }

  try {
    return await fn(lease);
  } finally {
    const onReleaseError = options.onReleaseError ?? defaultReleaseErrorHandler;
    try {
      const released = await lease.release();
      if (!released) {
        logger.warn("Lease expired before release", { name });
      }
    } catch (error) {
      onReleaseError(toError(error), { name, leaseId: lease.leaseId });
    }
  }
}

/** Creates a delay promise. */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
