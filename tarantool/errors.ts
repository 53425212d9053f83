// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LocksmithError } from "../common/errors.js";

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EPIPE",
  "EHOSTUNREACH",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Maps tarantool-driver errors to NetworkError or RemoteError.
 * Socket failures (by errno code) and a closed connection are network
 * errors. Anything else, whatever its wording, is a server answer.
 *
 * @param error - Driver error or string
 * @param functionName - Remote function being called, for context
 */
export function mapTarantoolError(
  error: unknown,
  functionName?: string,
): LocksmithError {
  if (error instanceof LocksmithError) {
    return error;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);

  if (
    (code !== undefined && NETWORK_ERROR_CODES.has(code)) ||
    [...NETWORK_ERROR_CODES].some((networkCode) =>
      errorMessage.includes(networkCode),
    ) ||
    errorMessage.includes("Connection is closed")
  ) {
    return new LocksmithError(
      "NetworkError",
      `Tarantool connection error: ${errorMessage}`,
      { functionName, cause: error },
    );
  }

  return new LocksmithError("RemoteError", `Tarantool error: ${errorMessage}`, {
    functionName,
    cause: error,
  });
}
