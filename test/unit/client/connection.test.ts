// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Connection manager: lazy double-checked construction, substitution, teardown
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { createConnectionManager } from "../../../client/connection.js";
import { createLocksmith } from "../../../client/locksmith.js";
import { createAsyncLock } from "../../../common/async-lock.js";
import { LocksmithError } from "../../../common/errors.js";
import { delay } from "../../../common/helpers.js";
import type {
  AsyncLock,
  ConnectionParams,
  RemoteCaller,
} from "../../../common/types.js";
import { tarantoolConnectionFactory } from "../../../tarantool/connection.js";
import {
  countingFactory,
  createMemoryAuthority,
} from "../../fixtures/memory-authority.js";

vi.mock("../../../tarantool/connection.js", () => ({
  tarantoolConnectionFactory: vi.fn(async () => ({ call: vi.fn() })),
}));

const params: ConnectionParams = {
  host: "127.0.0.1",
  port: 33013,
  timeoutMs: 1000,
};

function caller(): RemoteCaller {
  return { call: vi.fn(async () => [[null]]) };
}

function countingMutex(): AsyncLock & { entries(): number } {
  const lock = createAsyncLock();
  let count = 0;
  return {
    runExclusive(fn) {
      count++;
      return lock.runExclusive(fn);
    },
    entries: () => count,
  };
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error,
  );
}

describe("Connection Manager", () => {
  beforeEach(() => {
    vi.mocked(tarantoolConnectionFactory).mockClear();
  });

  it("should not connect before first use", () => {
    const { factory, constructions } = countingFactory(caller());
    createConnectionManager(params, { connectionFactory: factory });
    expect(constructions()).toBe(0);
  });

  it("should pass the construction parameters to the factory", async () => {
    const factory = vi.fn(async (_params: ConnectionParams) => caller());
    const manager = createConnectionManager(params, {
      connectionFactory: factory,
    });

    await manager.getConnection();
    expect(factory).toHaveBeenCalledWith(params);
  });

  it("should construct exactly one channel under concurrent first use", async () => {
    const shared = caller();
    const { factory, constructions } = countingFactory(shared, 10);
    const manager = createConnectionManager(params, {
      connectionFactory: factory,
    });

    const connections = await Promise.all(
      Array.from({ length: 25 }, () => manager.getConnection()),
    );

    expect(constructions()).toBe(1);
    for (const connection of connections) {
      expect(connection).toBe(shared);
    }
  });

  it("should construct once for concurrent operations on one Locksmith", async () => {
    const authority = createMemoryAuthority();
    const { factory, constructions } = countingFactory(authority, 5);
    const locksmith = createLocksmith({ connectionFactory: factory });

    const results = await Promise.all(
      Array.from({ length: 10 }, (_, i) => locksmith.acquire(`res:${i}`, 60)),
    );

    expect(constructions()).toBe(1);
    expect(results.every((lease) => lease !== null)).toBe(true);
  });

  it("should enter the mutex only while constructing", async () => {
    const inner = caller();
    const mutex = countingMutex();
    const manager = createConnectionManager(params, {
      connectionFactory: () => inner,
      mutex,
    });

    await manager.getConnection();
    await manager.getConnection();
    await manager.getConnection();

    expect(mutex.entries()).toBe(1);
  });

  it("should cache nothing when construction fails", async () => {
    const failure = new LocksmithError("NetworkError", "connect ECONNREFUSED");
    const shared = caller();
    const factory = vi
      .fn<(p: ConnectionParams) => Promise<RemoteCaller>>()
      .mockRejectedValueOnce(failure)
      .mockResolvedValueOnce(shared);
    const manager = createConnectionManager(params, {
      connectionFactory: factory,
    });

    await expect(manager.getConnection()).rejects.toBe(failure);
    await expect(manager.getConnection()).resolves.toBe(shared);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("should reject a factory result without call()", async () => {
    const manager = createConnectionManager(params, {
      connectionFactory: () => Reflect.apply(Object, undefined, []),
    });

    const error = await rejectionOf(manager.getConnection());
    expect(error).toBeInstanceOf(LocksmithError);
    if (error instanceof LocksmithError) {
      expect(error.code).toBe("InvalidConfiguration");
    }
  });

  it("should use the Tarantool factory by default", async () => {
    const manager = createConnectionManager(params);

    await manager.getConnection();
    expect(tarantoolConnectionFactory).toHaveBeenCalledWith(params);
  });

  describe("substitution", () => {
    it("should drop the current channel when the factory changes", async () => {
      const first = caller();
      const second = caller();
      const manager = createConnectionManager(params, {
        connectionFactory: () => first,
      });

      await expect(manager.getConnection()).resolves.toBe(first);
      manager.setConnectionFactory(() => second);
      await expect(manager.getConnection()).resolves.toBe(second);
    });

    it("should restore the Tarantool factory on null", async () => {
      const manager = createConnectionManager(params, {
        connectionFactory: () => caller(),
      });

      manager.setConnectionFactory(null);
      await manager.getConnection();
      expect(tarantoolConnectionFactory).toHaveBeenCalledTimes(1);
    });

    it("should reject a factory that is not a function", () => {
      const manager = createConnectionManager(params);
      expect(() =>
        Reflect.apply(manager.setConnectionFactory, manager, [{ call: 1 }]),
      ).toThrow(LocksmithError);
    });

    it("should use a substituted mutex for construction", async () => {
      const manager = createConnectionManager(params, {
        connectionFactory: () => caller(),
      });
      const mutex = countingMutex();

      manager.setMutex(mutex);
      await manager.getConnection();
      expect(mutex.entries()).toBe(1);
    });

    it("should restore a default mutex on null", async () => {
      const { factory, constructions } = countingFactory(caller(), 5);
      const manager = createConnectionManager(params, {
        connectionFactory: factory,
      });

      manager.setMutex(null);
      await Promise.all([manager.getConnection(), manager.getConnection()]);
      expect(constructions()).toBe(1);
    });

    it("should reject a mutex without runExclusive()", () => {
      const manager = createConnectionManager(params);
      const error = (() => {
        try {
          Reflect.apply(manager.setMutex, manager, [{ enter: () => {} }]);
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(LocksmithError);
      if (error instanceof LocksmithError) {
        expect(error.code).toBe("InvalidConfiguration");
        expect(error.message).toBe(
          "Mutex must have a runExclusive() method, or be null",
        );
      }
    });
  });

  describe("close", () => {
    it("should close the channel and reconnect on next use", async () => {
      const close = vi.fn();
      const { factory, constructions } = countingFactory({
        call: vi.fn(),
        close,
      });
      const manager = createConnectionManager(params, {
        connectionFactory: factory,
      });

      await manager.getConnection();
      await manager.close();
      expect(close).toHaveBeenCalledTimes(1);

      await manager.getConnection();
      expect(constructions()).toBe(2);
    });

    it("should close a channel dropped by a factory swap", async () => {
      const dropped = { call: vi.fn(), close: vi.fn() };
      const manager = createConnectionManager(params, {
        connectionFactory: () => dropped,
      });

      await manager.getConnection();
      manager.setConnectionFactory(() => caller());
      await manager.getConnection();
      await manager.close();

      expect(dropped.close).toHaveBeenCalledTimes(1);
    });

    it("should close a channel built while the factory was swapped", async () => {
      const early = { call: vi.fn(), close: vi.fn() };
      const late = { call: vi.fn(), close: vi.fn() };
      const manager = createConnectionManager(params, {
        connectionFactory: async () => {
          await delay(10);
          return early;
        },
      });

      const pending = manager.getConnection();
      await delay(1);
      manager.setConnectionFactory(() => late);

      await expect(pending).resolves.toBe(early);
      await expect(manager.getConnection()).resolves.toBe(late);
      await manager.close();

      expect(early.close).toHaveBeenCalledTimes(1);
      expect(late.close).toHaveBeenCalledTimes(1);
    });

    it("should close each channel only once", async () => {
      const close = vi.fn();
      const manager = createConnectionManager(params, {
        connectionFactory: () => ({ call: vi.fn(), close }),
      });

      await manager.getConnection();
      manager.setConnectionFactory(() => caller());
      await manager.close();
      await manager.close();

      expect(close).toHaveBeenCalledTimes(1);
    });

    it("should be a no-op before first use", async () => {
      const manager = createConnectionManager(params, {
        connectionFactory: () => caller(),
      });
      await expect(manager.close()).resolves.toBeUndefined();
    });
  });
});
