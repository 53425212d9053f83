// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LOCKSMITH_DEFAULTS } from "../common/constants.js";
import { LocksmithError } from "../common/errors.js";
import type { RedisCallerConfig, RedisCallerOptions } from "./types.js";

/**
 * Default configuration for the Redis-hosted authority.
 */
export const REDIS_DEFAULTS = {
  /** Key prefix for lease entries */
  keyPrefix: "locksmith",
  /** Poll interval for waiting acquires */
  pollIntervalMs: 50,
} as const;

/**
 * Merges user options with defaults and validates configuration.
 * @throws {LocksmithError} InvalidConfiguration for an empty prefix or non-positive poll interval
 */
export function createRedisCallerConfig(
  options: RedisCallerOptions = {},
): RedisCallerConfig {
  const keyPrefix = options.keyPrefix ?? REDIS_DEFAULTS.keyPrefix;
  const namespace = options.namespace ?? LOCKSMITH_DEFAULTS.namespace;
  const pollIntervalMs =
    options.pollIntervalMs ?? REDIS_DEFAULTS.pollIntervalMs;

  if (!keyPrefix) {
    throw new LocksmithError(
      "InvalidConfiguration",
      "keyPrefix must be a non-empty string",
    );
  }
  if (!namespace) {
    throw new LocksmithError(
      "InvalidConfiguration",
      "namespace must be a non-empty string",
    );
  }
  if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
    throw new LocksmithError(
      "InvalidConfiguration",
      `pollIntervalMs must be a positive number (current: ${pollIntervalMs})`,
    );
  }

  return { keyPrefix, namespace, pollIntervalMs };
}
