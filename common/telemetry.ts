// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { hashKey } from "./crypto.js";
import { Lease } from "./lease.js";
import type {
  LeaseEvent,
  LeaseId,
  Locksmith,
  LockName,
  TelemetryOptions,
} from "./types.js";

/**
 * Wraps a Locksmith with telemetry hooks. No cost when not used.
 * Leases returned by the wrapper delegate back to the wrapper, so their
 * update/release calls are reported too.
 *
 * @param locksmith - Coordinator to instrument
 * @param options - Event callback and raw-identifier policy
 * @returns Instrumented Locksmith with the same behavior
 */
export function withTelemetry(
  locksmith: Locksmith,
  options: TelemetryOptions,
): Locksmith {
  /**
   * Telemetry failures must not affect lock operations.
   */
  const emitEvent = (event: LeaseEvent): void => {
    try {
      options.onEvent(event);
    } catch {
      // Event sinks are best-effort; the operation result stands
    }
  };

  /**
   * Raw identifiers are redacted unless includeRaw says otherwise.
   */
  const shouldIncludeRaw = (event: LeaseEvent): boolean => {
    if (typeof options.includeRaw === "function") {
      try {
        return options.includeRaw(event);
      } catch {
        return false; // Redact on predicate errors
      }
    }
    return options.includeRaw ?? false;
  };

  const emitMutation = (
    type: "update" | "release",
    leaseId: LeaseId,
    ok: boolean,
  ): void => {
    const event: LeaseEvent = {
      type,
      leaseIdHash: hashKey(leaseId),
      result: ok ? "ok" : "fail",
    };
    if (!ok) {
      event.reason = "not-found";
    }
    if (shouldIncludeRaw(event)) {
      event.leaseId = leaseId;
    }
    emitEvent(event);
  };

  const wrapped: Locksmith = {
    async acquire(name: LockName, validity: number, timeout?: number) {
      const lease = await locksmith.acquire(name, validity, timeout);

      const event: LeaseEvent = {
        type: "acquire",
        nameHash: hashKey(name),
        result: lease ? "ok" : "fail",
      };
      if (lease) {
        event.leaseIdHash = hashKey(lease.leaseId);
      } else {
        event.reason = "locked";
      }
      if (shouldIncludeRaw(event)) {
        event.name = name;
        if (lease) {
          event.leaseId = lease.leaseId;
        }
      }

      emitEvent(event);
      return lease ? new Lease(wrapped, lease.name, lease.leaseId) : null;
    },

    async update(leaseId: LeaseId, validity: number) {
      const ok = await locksmith.update(leaseId, validity);
      emitMutation("update", leaseId, ok);
      return ok;
    },

    async release(leaseId: LeaseId) {
      const ok = await locksmith.release(leaseId);
      emitMutation("release", leaseId, ok);
      return ok;
    },

    async statistics() {
      const stats = await locksmith.statistics();
      emitEvent({ type: "statistics", result: "ok" });
      return stats;
    },
  };

  return wrapped;
}
