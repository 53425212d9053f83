// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { REMOTE_FUNCTIONS } from "../common/constants.js";
import { generateLeaseId } from "../common/crypto.js";
import { LocksmithError } from "../common/errors.js";
import { delay } from "../common/helpers.js";
import type { RemoteCaller } from "../common/types.js";
import { createRedisCallerConfig } from "./config.js";
import { mapRedisError } from "./errors.js";
import { ACQUIRE_SCRIPT, RELEASE_SCRIPT, UPDATE_SCRIPT } from "./scripts.js";
import type {
  RedisCallerOptions,
  RedisLockClient,
  RedisLockStatistics,
} from "./types.js";

function malformedCall(functionName: string, message: string): LocksmithError {
  return new LocksmithError(
    "RemoteError",
    `Malformed call to ${functionName}: ${message}`,
    { functionName },
  );
}

function toTtlMs(validity: number): number {
  return Math.max(1, Math.ceil(validity * 1000));
}

function isValidity(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function toCount(value: string | undefined): number {
  const count = Number(value ?? 0);
  return Number.isFinite(count) ? count : 0;
}

/**
 * Serves the locksmith remote functions from Redis, so a Locksmith can run
 * against Redis instead of Tarantool:
 *
 * ```typescript
 * locksmith.setConnectionFactory(() => createRedisCaller(redis));
 * ```
 *
 * Storage: lease id at {keyPrefix}:lock:{name}, lock key at
 * {keyPrefix}:id:{leaseId}, counters in {keyPrefix}:stats.
 *
 * Lua scripts cannot block, so the authority-side wait behind an acquire
 * timeout is served here by retrying the script every `pollIntervalMs`.
 *
 * @param redis - ioredis client instance
 * @param options - Key prefix, namespace and poll interval
 * @returns RemoteCaller answering with authority-shaped tuples
 */
export function createRedisCaller(
  redis: RedisLockClient,
  options: RedisCallerOptions = {},
): RemoteCaller {
  const config = createRedisCallerConfig(options);
  const statsKey = `${config.keyPrefix}:stats`;
  const lockKeyOf = (name: string) => `${config.keyPrefix}:lock:${name}`;
  const leaseIdKeyOf = (leaseId: string) => `${config.keyPrefix}:id:${leaseId}`;

  const tryAcquire = async (
    name: string,
    ttlMs: number,
    firstAttempt: boolean,
  ) => {
    const leaseId = generateLeaseId();
    const result = await redis.eval(
      ACQUIRE_SCRIPT,
      3,
      lockKeyOf(name),
      leaseIdKeyOf(leaseId),
      statsKey,
      leaseId,
      ttlMs.toString(),
      firstAttempt ? "1" : "0",
    );
    return result === 1 ? leaseId : null;
  };

  const acquire = async (
    functionName: string,
    args: readonly unknown[],
  ): Promise<unknown[][]> => {
    const [name, validity, timeout] = args;
    if (typeof name !== "string" || !name) {
      throw malformedCall(functionName, "lock name must be a non-empty string");
    }
    if (!isValidity(validity)) {
      throw malformedCall(functionName, "validity must be a positive number");
    }
    if (
      timeout !== undefined &&
      (typeof timeout !== "number" || !Number.isFinite(timeout) || timeout < 0)
    ) {
      throw malformedCall(functionName, "timeout must be a non-negative number");
    }

    const ttlMs = toTtlMs(validity);
    const deadline =
      timeout === undefined ? Infinity : Date.now() + timeout * 1000;

    for (let attempt = 0; ; attempt++) {
      const leaseId = await tryAcquire(name, ttlMs, attempt === 0);
      if (leaseId) {
        return [[leaseId, name, leaseId]];
      }

      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) {
        return [[null]];
      }
      await delay(Math.min(config.pollIntervalMs, remainingMs));
    }
  };

  const update = async (
    functionName: string,
    args: readonly unknown[],
  ): Promise<unknown[][]> => {
    const [leaseId, validity] = args;
    if (typeof leaseId !== "string" || !leaseId) {
      throw malformedCall(functionName, "lease id must be a non-empty string");
    }
    if (!isValidity(validity)) {
      throw malformedCall(functionName, "validity must be a positive number");
    }

    const result = await redis.eval(
      UPDATE_SCRIPT,
      2,
      leaseIdKeyOf(leaseId),
      statsKey,
      leaseId,
      toTtlMs(validity).toString(),
    );
    return [[result === 1 ? leaseId : null]];
  };

  const release = async (
    functionName: string,
    args: readonly unknown[],
  ): Promise<unknown[][]> => {
    const [leaseId] = args;
    if (typeof leaseId !== "string" || !leaseId) {
      throw malformedCall(functionName, "lease id must be a non-empty string");
    }

    const result = await redis.eval(
      RELEASE_SCRIPT,
      2,
      leaseIdKeyOf(leaseId),
      statsKey,
      leaseId,
    );
    return [[result === 1 ? leaseId : null]];
  };

  const statistics = async (): Promise<unknown[][]> => {
    const counters = await redis.hgetall(statsKey);
    const stats: RedisLockStatistics = {
      acquired: toCount(counters.acquired),
      contended: toCount(counters.contended),
      updated: toCount(counters.updated),
      released: toCount(counters.released),
      missed: toCount(counters.missed),
    };
    return [[stats]];
  };

  const handlers: Record<
    string,
    (functionName: string, args: readonly unknown[]) => Promise<unknown[][]>
  > = {
    [`${config.namespace}:${REMOTE_FUNCTIONS.acquire}`]: acquire,
    [`${config.namespace}:${REMOTE_FUNCTIONS.update}`]: update,
    [`${config.namespace}:${REMOTE_FUNCTIONS.release}`]: release,
    [`${config.namespace}:${REMOTE_FUNCTIONS.statistics}`]: statistics,
  };

  return {
    async call(
      functionName: string,
      args: readonly unknown[],
    ): Promise<unknown> {
      const handler = handlers[functionName];
      if (!handler) {
        throw new LocksmithError(
          "RemoteError",
          `Procedure '${functionName}' is not defined`,
          { functionName },
        );
      }

      try {
        return await handler(functionName, args);
      } catch (error) {
        throw mapRedisError(error, functionName);
      }
    },
  };
}
