// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { beforeEach, describe, expect, it } from "vitest";
import type { LocksmithClient } from "../../client/locksmith.js";
import { Lease } from "../../common/lease.js";
import { authorities } from "../fixtures/authorities.js";

describe("Lock Lifecycle", () => {
  for (const fixture of authorities) {
    describe(fixture.name, () => {
      let locksmith: LocksmithClient;

      beforeEach(() => {
        locksmith = fixture.setup();
      });

      it("should acquire, reject a second owner, release and re-acquire", async () => {
        const first = await locksmith.acquire("foo", 60);
        expect(first).toBeInstanceOf(Lease);
        expect(first?.name).toBe("foo");

        await expect(locksmith.acquire("foo", 60, 0)).resolves.toBeNull();
        await expect(first?.release()).resolves.toBe(true);

        const second = await locksmith.acquire("foo", 60);
        expect(second?.name).toBe("foo");
        expect(second?.leaseId).not.toBe(first?.leaseId);
      });

      it("should report a second release as false", async () => {
        const lease = await locksmith.acquire("jobs:report", 60);

        await expect(lease?.release()).resolves.toBe(true);
        await expect(lease?.release()).resolves.toBe(false);
      });

      it("should update a live lease", async () => {
        const lease = await locksmith.acquire("jobs:report", 60);

        await expect(lease?.update(120)).resolves.toBe(true);
        await expect(locksmith.acquire("jobs:report", 60, 0)).resolves.toBeNull();
      });

      it("should report update and release of an unknown lease as false", async () => {
        await expect(locksmith.update("no-such-lease", 60)).resolves.toBe(false);
        await expect(locksmith.release("no-such-lease")).resolves.toBe(false);
      });

      it("should keep locks on different names independent", async () => {
        const a = await locksmith.acquire("res:a", 60);
        const b = await locksmith.acquire("res:b", 60, 0);

        expect(a).not.toBeNull();
        expect(b).not.toBeNull();
        await expect(a?.release()).resolves.toBe(true);
        await expect(locksmith.acquire("res:b", 60, 0)).resolves.toBeNull();
      });

      it("should answer statistics with a record", async () => {
        const lease = await locksmith.acquire("stats", 60);
        await lease?.release();

        const stats = await locksmith.statistics();
        expect(stats).toMatchObject({ acquired: 1, released: 1 });
      });
    });
  }
});
