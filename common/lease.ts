// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { LeaseId, Locksmith, LockName } from "./types.js";

/**
 * One granted lock. Identity is fixed at construction; every operation
 * round-trips to the authority, so a stale lease answers `false` rather than
 * a cached truth.
 */
export class Lease {
  constructor(
    readonly locksmith: Locksmith,
    readonly name: LockName,
    readonly leaseId: LeaseId,
  ) {}

  /**
   * Extends this lease to `validity` seconds from now.
   * @returns false when the lease is unknown or expired
   */
  update(validity: number): Promise<boolean> {
    return this.locksmith.update(this.leaseId, validity);
  }

  /**
   * Releases this lease.
   * @returns false when the lease is unknown or expired
   */
  release(): Promise<boolean> {
    return this.locksmith.release(this.leaseId);
  }

  toString(): string {
    return `<Lease name='${this.name}' id='${this.leaseId}'>`;
  }

  toJSON(): { name: LockName; leaseId: LeaseId } {
    return { name: this.name, leaseId: this.leaseId };
  }
}
