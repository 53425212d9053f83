// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LocksmithError } from "../common/errors.js";

/**
 * Maps Redis client errors to NetworkError or RemoteError.
 *
 * @param error - Redis client error or string
 * @param functionName - Remote function being served, for context
 */
export function mapRedisError(
  error: unknown,
  functionName?: string,
): LocksmithError {
  if (error instanceof LocksmithError) {
    return error;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);

  // Network timeout and connection errors
  if (
    errorMessage.includes("timeout") ||
    errorMessage.includes("ECONNRESET") ||
    errorMessage.includes("ENOTFOUND") ||
    errorMessage.includes("ECONNREFUSED") ||
    errorMessage.includes("Connection is closed")
  ) {
    return new LocksmithError(
      "NetworkError",
      `Redis connection error: ${errorMessage}`,
      { functionName, cause: error },
    );
  }

  // Authentication, command and script errors are server answers
  return new LocksmithError("RemoteError", `Redis error: ${errorMessage}`, {
    functionName,
    cause: error,
  });
}
