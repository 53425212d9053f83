// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * lease-locksmith - client for a remote lock authority
 *
 * Acquire, renew and release named, time-bounded leases held by a remote
 * authority (Tarantool "locksmith" by default, or Redis via redis/).
 */

// Core Types

export type {
  AcquireReply,
  AsyncLock,
  CallOptions,
  ConnectionFactory,
  ConnectionParams,
  LeaseEvent,
  LeaseId,
  Locksmith,
  LocksmithConfig,
  LocksmithOptions,
  LockName,
  OnReleaseError,
  RemoteCaller,
  TelemetryOptions,
} from "./common/types.js";

// Configuration Constants

export {
  LEASE_DEFAULTS,
  LOCKSMITH_DEFAULTS,
  REMOTE_FUNCTIONS,
} from "./common/constants.js";

// Core Functions and Classes

export { LocksmithError } from "./common/errors.js";
export { Lease } from "./common/lease.js";
export { createAsyncLock, isAsyncLock } from "./common/async-lock.js";

export {
  createConnectionManager,
  createLocksmith,
  createLocksmithConfig,
  locksmithOptionsFromEnv,
} from "./client/index.js";
export type { ConnectionManager, LocksmithClient } from "./client/index.js";

export {
  decodeAcquireReply,
  decodeMutationReply,
  decodeStatisticsReply,
} from "./common/replies.js";

// Scoped lease helper with guaranteed release
export { withLease } from "./common/helpers.js";
export type { WithLeaseOptions } from "./common/helpers.js";

// Telemetry - Opt-in observability decorator
export { withTelemetry } from "./common/telemetry.js";

// Default transport
export { createTarantoolCaller } from "./tarantool/index.js";
