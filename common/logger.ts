// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Console logger for library diagnostics.
 *
 * - debug: only with LOCKSMITH_DEBUG=true
 * - warn/error: always outside production; in production only with LOCKSMITH_DEBUG=true
 *
 * Lock names and lease ids are only included in debug lines.
 */

const PREFIX = "[Locksmith]";

function debugEnabled(): boolean {
  return process.env.LOCKSMITH_DEBUG === "true";
}

function problemsEnabled(): boolean {
  return process.env.NODE_ENV !== "production" || debugEnabled();
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    if (debugEnabled()) {
      console.debug(`${PREFIX} ${message}`, meta ?? {});
    }
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    if (problemsEnabled()) {
      console.warn(`${PREFIX} ${message}`, meta ?? {});
    }
  },

  error(message: string, meta?: Record<string, unknown>): void {
    if (problemsEnabled()) {
      console.error(`${PREFIX} ${message}`, meta ?? {});
    }
  },
};
