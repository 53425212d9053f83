// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { createRedisCaller } from "./caller.js";
export { createRedisCallerConfig, REDIS_DEFAULTS } from "./config.js";
export { mapRedisError } from "./errors.js";
export type {
  RedisCallerOptions,
  RedisCallerConfig,
  RedisLockClient,
  RedisLockStatistics,
} from "./types.js";
