// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Lock coordinator: call shapes, reply decoding and error propagation
 */

import { describe, expect, it, vi } from "vitest";
import { createLocksmith } from "../../../client/locksmith.js";
import { LocksmithError } from "../../../common/errors.js";
import { Lease } from "../../../common/lease.js";
import type { CallOptions } from "../../../common/types.js";

function setup(reply: unknown = [[null]], namespace?: string) {
  const call = vi.fn(
    async (
      _functionName: string,
      _args: readonly unknown[],
      _options?: CallOptions,
    ): Promise<unknown> => reply,
  );
  const locksmith = createLocksmith({
    connectionFactory: () => ({ call }),
    namespace,
  });
  return { call, locksmith };
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error,
  );
}

describe("Locksmith", () => {
  describe("acquire", () => {
    it("should send (name, validity) without a timeout", async () => {
      const { call, locksmith } = setup();

      await locksmith.acquire("foo", 60);
      expect(call).toHaveBeenCalledWith("locksmith:acquire", ["foo", 60], {
        waitMs: Infinity,
      });
    });

    it("should send (name, validity, timeout) with a timeout", async () => {
      const { call, locksmith } = setup();

      await locksmith.acquire("foo", 60, 3);
      expect(call).toHaveBeenCalledWith("locksmith:acquire", ["foo", 60, 3], {
        waitMs: 3000,
      });
    });

    it("should send a zero timeout as given", async () => {
      const { call, locksmith } = setup();

      await locksmith.acquire("foo", 60, 0);
      expect(call).toHaveBeenCalledWith("locksmith:acquire", ["foo", 60, 0], {
        waitMs: 0,
      });
    });

    it("should call the functions of the configured namespace", async () => {
      const { call, locksmith } = setup([[null]], "billing");

      await locksmith.acquire("foo", 60);
      await locksmith.update("lease-1", 60);
      await locksmith.release("lease-1");
      await locksmith.statistics();

      expect(call.mock.calls.map(([functionName]) => functionName)).toEqual([
        "billing:acquire",
        "billing:update",
        "billing:release",
        "billing:statistics",
      ]);
    });

    it("should build a lease from the echoed name and lease id", async () => {
      const { locksmith } = setup([["lease-1", "foo", "lease-1"]]);

      const lease = await locksmith.acquire("foo", 60);
      expect(lease).toBeInstanceOf(Lease);
      expect(lease?.name).toBe("foo");
      expect(lease?.leaseId).toBe("lease-1");
      expect(lease?.locksmith).toBe(locksmith);
    });

    it("should return null when the lock is held", async () => {
      const { locksmith } = setup([[null]]);
      await expect(locksmith.acquire("foo", 60, 0)).resolves.toBeNull();
    });

    it("should read a nil first result as not granted", async () => {
      const { locksmith } = setup([null]);
      await expect(locksmith.acquire("foo", 60)).resolves.toBeNull();
    });

    it("should make exactly one call per acquire", async () => {
      const { call, locksmith } = setup([[null]]);

      await locksmith.acquire("foo", 60, 1);
      expect(call).toHaveBeenCalledTimes(1);
    });

    it("should reject an empty reply as malformed", async () => {
      const { locksmith } = setup([]);

      const error = await rejectionOf(locksmith.acquire("foo", 60));
      expect(error).toBeInstanceOf(LocksmithError);
      if (error instanceof LocksmithError) {
        expect(error.code).toBe("MalformedReply");
        expect(error.message).toBe("Zero tuple in reply to locksmith:acquire");
      }
    });

    const invalid: Array<[string, string, number, number | undefined]> = [
      ["empty name", "", 60, undefined],
      ["zero validity", "foo", 0, undefined],
      ["negative validity", "foo", -1, undefined],
      ["negative timeout", "foo", 60, -1],
    ];

    it.each(invalid)("should reject %s before any call", async (_label, name, validity, timeout) => {
      const { call, locksmith } = setup();

      const error = await rejectionOf(locksmith.acquire(name, validity, timeout));
      expect(error).toBeInstanceOf(LocksmithError);
      if (error instanceof LocksmithError) {
        expect(error.code).toBe("InvalidArgument");
      }
      expect(call).not.toHaveBeenCalled();
    });
  });

  describe("update", () => {
    it("should send (leaseId, validity) and report success", async () => {
      const { call, locksmith } = setup([["lease-1"]]);

      await expect(locksmith.update("lease-1", 30)).resolves.toBe(true);
      expect(call).toHaveBeenCalledWith("locksmith:update", ["lease-1", 30]);
    });

    it("should return false for an unknown lease", async () => {
      const { locksmith } = setup([[null]]);
      await expect(locksmith.update("lease-1", 30)).resolves.toBe(false);
    });

    it("should reject an empty lease id before any call", async () => {
      const { call, locksmith } = setup();

      await expect(locksmith.update("", 30)).rejects.toThrow(
        "Invalid lease id, got: empty/null",
      );
      expect(call).not.toHaveBeenCalled();
    });
  });

  describe("release", () => {
    it("should send (leaseId) and report success", async () => {
      const { call, locksmith } = setup([["lease-1"]]);

      await expect(locksmith.release("lease-1")).resolves.toBe(true);
      expect(call).toHaveBeenCalledWith("locksmith:release", ["lease-1"]);
    });

    it("should return false for an unknown lease", async () => {
      const { locksmith } = setup([[null]]);
      await expect(locksmith.release("lease-1")).resolves.toBe(false);
    });
  });

  describe("statistics", () => {
    it("should call with no arguments and return the record verbatim", async () => {
      const stats = { acquired: 3, released: 2 };
      const { call, locksmith } = setup([[stats]]);

      await expect(locksmith.statistics()).resolves.toBe(stats);
      expect(call).toHaveBeenCalledWith("locksmith:statistics", []);
    });

    it("should return a map reply as is", async () => {
      const stats = { acquired: 1 };
      const { locksmith } = setup([stats]);

      await expect(locksmith.statistics()).resolves.toBe(stats);
    });
  });

  describe("errors", () => {
    it("should pass transport errors through unchanged", async () => {
      const failure = new LocksmithError("NetworkError", "connection reset");
      const call = vi.fn(async () => {
        throw failure;
      });
      const locksmith = createLocksmith({ connectionFactory: () => ({ call }) });

      await expect(locksmith.acquire("foo", 60)).rejects.toBe(failure);
      await expect(locksmith.update("lease-1", 60)).rejects.toBe(failure);
      await expect(locksmith.release("lease-1")).rejects.toBe(failure);
      await expect(locksmith.statistics()).rejects.toBe(failure);
      expect(call).toHaveBeenCalledTimes(4);
    });

    it("should pass remote errors through unchanged", async () => {
      const failure = new LocksmithError(
        "RemoteError",
        "Procedure 'locksmith:acquire' is not defined",
      );
      const locksmith = createLocksmith({
        connectionFactory: () => ({
          call: async () => {
            throw failure;
          },
        }),
      });

      await expect(locksmith.acquire("foo", 60)).rejects.toBe(failure);
    });

    it("should surface a failed connection and try again on the next call", async () => {
      const failure = new LocksmithError("NetworkError", "connect ECONNREFUSED");
      const call = vi.fn(async () => [["lease-1"]]);
      const factory = vi
        .fn()
        .mockRejectedValueOnce(failure)
        .mockResolvedValueOnce({ call });
      const locksmith = createLocksmith({ connectionFactory: factory });

      await expect(locksmith.release("lease-1")).rejects.toBe(failure);
      await expect(locksmith.release("lease-1")).resolves.toBe(true);
      expect(factory).toHaveBeenCalledTimes(2);
    });
  });

  describe("channel control", () => {
    it("should expose the shared connection", async () => {
      const caller = { call: vi.fn() };
      const locksmith = createLocksmith({ connectionFactory: () => caller });

      await expect(locksmith.getConnection()).resolves.toBe(caller);
    });

    it("should route calls to a substituted transport", async () => {
      const first = setup([["lease-1"]]);
      const second = vi.fn(async () => [[null]]);

      first.locksmith.setConnectionFactory(() => ({ call: second }));
      await expect(first.locksmith.release("lease-1")).resolves.toBe(false);
      expect(first.call).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
    });
  });
});
