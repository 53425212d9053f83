// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Client defaults applied by createLocksmithConfig().
 */
export const LOCKSMITH_DEFAULTS = {
  host: "localhost",
  port: 33013,
  /** Round-trip timeout for a single remote call in ms */
  timeoutMs: 1_000,
  /** Prefix of the remote function names (`locksmith:acquire`, ...) */
  namespace: "locksmith",
} as const;

/**
 * Remote functions exposed by the lock authority, without namespace.
 */
export const REMOTE_FUNCTIONS = {
  acquire: "acquire",
  update: "update",
  release: "release",
  statistics: "statistics",
} as const;

export type RemoteFunction =
  (typeof REMOTE_FUNCTIONS)[keyof typeof REMOTE_FUNCTIONS];

/**
 * Defaults for the withLease() helper.
 */
export const LEASE_DEFAULTS = {
  /** Lease validity in seconds */
  validity: 30,
} as const;

/** Highest TCP port number */
export const MAX_PORT = 65_535;
