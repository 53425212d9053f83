// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Redis } from "ioredis";

/**
 * ioredis surface used by the Redis-hosted authority.
 */
export type RedisLockClient = Pick<Redis, "eval" | "hgetall">;

/**
 * Configuration options for createRedisCaller()
 */
export interface RedisCallerOptions {
  /** Redis key prefix (default: "locksmith") */
  keyPrefix?: string;
  /** Remote function namespace served (default: "locksmith") */
  namespace?: string;
  /** Delay between attempts while an acquire waits, in ms (default: 50) */
  pollIntervalMs?: number;
}

/**
 * Internal configuration with defaults applied
 */
export interface RedisCallerConfig {
  keyPrefix: string;
  namespace: string;
  pollIntervalMs: number;
}

/**
 * Counters kept in the `<prefix>:stats` hash
 */
export interface RedisLockStatistics {
  /** Leases granted */
  acquired: number;
  /** Acquire requests that found the name held, once per request however long it waits */
  contended: number;
  updated: number;
  released: number;
  /** Update/release calls on unknown or expired leases */
  missed: number;
}
