// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { AsyncLock } from "./types.js";

/**
 * Promise-chain lock: critical sections run one at a time in call order.
 * A rejected section does not block the ones queued after it.
 */
export function createAsyncLock(): AsyncLock {
  const state: { tail: Promise<unknown> } = { tail: Promise.resolve() };
  return {
    runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
      const run = state.tail.then(() => fn());
      state.tail = run.catch(() => undefined);
      return run;
    },
  };
}

/**
 * Run-time capability check for lock substitutes coming from untyped callers.
 */
export function isAsyncLock(value: unknown): value is AsyncLock {
  return (
    typeof value === "object" &&
    value !== null &&
    "runExclusive" in value &&
    typeof value.runExclusive === "function"
  );
}
