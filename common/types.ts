// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Core type definitions for the lease-locksmith client.
 * Defines the transport seam, the coordinator interface and decoded replies.
 */

import type { Lease } from "./lease.js";

// ============================================================================
// Transport
// ============================================================================

/** Per-call hints passed from the coordinator to the transport. */
export interface CallOptions {
  /**
   * Time in ms the authority may legitimately hold this call open before
   * replying (acquire with a timeout). `Infinity` for an unbounded wait.
   * Transports add it to their own round-trip timeout.
   */
  waitMs?: number;
}

/**
 * Minimal capability of a channel to the lock authority: perform a named
 * remote call with positional arguments and return the raw reply.
 */
export interface RemoteCaller {
  call(
    functionName: string,
    args: readonly unknown[],
    options?: CallOptions,
  ): Promise<unknown>;
  /** Tear down the underlying channel */
  close?(): Promise<void> | void;
}

/** Construction parameters handed to a ConnectionFactory. */
export interface ConnectionParams {
  readonly host: string;
  readonly port: number;
  readonly user?: string;
  readonly password?: string;
  /** Socket-level round-trip timeout in ms */
  readonly timeoutMs: number;
}

/** Builds the single channel owned by a connection manager. */
export type ConnectionFactory = (
  params: ConnectionParams,
) => RemoteCaller | Promise<RemoteCaller>;

/** Scoped mutual exclusion guarding channel construction. */
export interface AsyncLock {
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T>;
}

// ============================================================================
// Decoded replies
// ============================================================================

/** Identifier chosen by callers for a contended resource */
export type LockName = string;

/** Authority-generated token identifying one grant (e.g. a UUID) */
export type LeaseId = string;

/** Decoded `acquire` reply. */
export type AcquireReply =
  | { granted: true; name: LockName; leaseId: LeaseId }
  | { granted: false };

// ============================================================================
// Coordinator
// ============================================================================

/**
 * Lease operations against the lock authority. Durations are seconds.
 */
export interface Locksmith {
  /**
   * Acquire `name` for `validity` seconds.
   * `timeout` undefined waits as long as the authority does, `0` tries once,
   * `N > 0` lets the authority wait up to N seconds.
   * Returns `null` when the lock is held by someone else.
   */
  acquire(
    name: LockName,
    validity: number,
    timeout?: number,
  ): Promise<Lease | null>;

  /** Extend a live lease to `validity` seconds from now. `false` if unknown or expired. */
  update(leaseId: LeaseId, validity: number): Promise<boolean>;

  /** Release a live lease. `false` if unknown or expired. */
  release(leaseId: LeaseId): Promise<boolean>;

  /** Authority statistics, returned verbatim */
  statistics(): Promise<unknown>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Options accepted by createLocksmith().
 */
export interface LocksmithOptions {
  /** Authority host (default: "localhost") */
  host?: string;
  /** Authority port (default: 33013) */
  port?: number;
  user?: string;
  password?: string;
  /** Round-trip timeout per remote call in ms (default: 1000) */
  timeoutMs?: number;
  /** Remote function prefix (default: "locksmith") */
  namespace?: string;
  /** Transport substitute (default: Tarantool connection) */
  connectionFactory?: ConnectionFactory;
  /** Mutual exclusion substitute for channel construction */
  mutex?: AsyncLock;
}

/**
 * Internal configuration with defaults applied.
 */
export interface LocksmithConfig {
  readonly connection: ConnectionParams;
  readonly namespace: string;
}

// ============================================================================
// Telemetry Types
// ============================================================================

/**
 * Minimal event structure for telemetry. Hashes computed on-demand.
 */
export type LeaseEvent = {
  type: "acquire" | "update" | "release" | "statistics";
  /** Lock name hash */
  nameHash?: string;
  /** Lease id hash */
  leaseIdHash?: string;
  result: "ok" | "fail";
  /** Soft failure reason: lock held elsewhere, or lease unknown/expired */
  reason?: "locked" | "not-found";
  /** Raw lock name (only when includeRaw allows) */
  name?: string;
  /** Raw lease id (only when includeRaw allows) */
  leaseId?: string;
};

/**
 * Telemetry decorator configuration.
 */
export interface TelemetryOptions {
  onEvent: (event: LeaseEvent) => void;
  /** Include raw identifiers in events (boolean or predicate) */
  includeRaw?: boolean | ((event: LeaseEvent) => boolean);
}

/**
 * Callback for release failures inside withLease(). Never called when the
 * lease had already expired (that is a `false` result, not an error).
 */
export type OnReleaseError = (
  error: Error,
  context: { name: LockName; leaseId: LeaseId },
) => void;
