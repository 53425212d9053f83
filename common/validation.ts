// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LocksmithError } from "./errors.js";

/**
 * Validates a lock name before it is sent to the authority.
 *
 * @throws {LocksmithError} InvalidArgument for empty or non-string names
 */
export function validateLockName(name: string): void {
  if (typeof name !== "string" || name.length === 0) {
    throw new LocksmithError(
      "InvalidArgument",
      "Lock name must be a non-empty string",
    );
  }
}

/**
 * Validates a lease id. Ids are opaque to the client, so only emptiness is checked.
 *
 * @throws {LocksmithError} InvalidArgument for empty or non-string ids
 */
export function validateLeaseId(leaseId: string): void {
  if (typeof leaseId !== "string" || leaseId.length === 0) {
    throw new LocksmithError(
      "InvalidArgument",
      `Invalid lease id, got: ${leaseId || "empty/null"}`,
    );
  }
}

/**
 * Validates a lease validity in seconds (finite, > 0).
 */
export function validateValidity(validity: number): void {
  if (typeof validity !== "number" || !Number.isFinite(validity) || validity <= 0) {
    throw new LocksmithError(
      "InvalidArgument",
      `validity must be a positive number of seconds, got: ${validity}`,
    );
  }
}

/**
 * Validates an acquire timeout in seconds. `undefined` means "wait as long as
 * the authority does" and is always valid.
 */
export function validateTimeout(timeout: number | undefined): void {
  if (timeout === undefined) return;
  if (typeof timeout !== "number" || !Number.isFinite(timeout) || timeout < 0) {
    throw new LocksmithError(
      "InvalidArgument",
      `timeout must be a non-negative number of seconds, got: ${timeout}`,
    );
  }
}
