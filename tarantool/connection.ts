// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import TarantoolConnection from "tarantool-driver";
import { LocksmithError } from "../common/errors.js";
import type {
  CallOptions,
  ConnectionFactory,
  ConnectionParams,
  RemoteCaller,
} from "../common/types.js";
import { mapTarantoolError } from "./errors.js";

/** Largest delay setTimeout accepts; longer ones fire after 1 ms */
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Races a remote call against the round-trip deadline.
 * No deadline when the authority may hold the call open indefinitely, or
 * longer than a timer can wait.
 */
function withDeadline<T>(
  promise: Promise<T>,
  deadlineMs: number,
  functionName: string,
): Promise<T> {
  if (!Number.isFinite(deadlineMs) || deadlineMs > MAX_TIMER_MS) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () =>
        reject(
          new LocksmithError(
            "NetworkError",
            `Tarantool call ${functionName} timed out after ${deadlineMs}ms`,
            { functionName },
          ),
        ),
      deadlineMs,
    );
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Opens a tarantool-driver connection and adapts it to RemoteCaller.
 * Connection failures surface here, so a failed open caches nothing upstream.
 *
 * @param params - Host, port, credentials and round-trip timeout
 * @returns Connected caller; `close()` disconnects
 * @throws {LocksmithError} NetworkError when the server cannot be reached
 */
export async function createTarantoolCaller(
  params: ConnectionParams,
): Promise<RemoteCaller> {
  const connection = new TarantoolConnection({
    host: params.host,
    port: params.port,
    username: params.user,
    password: params.password,
    timeout: params.timeoutMs,
    lazyConnect: true,
  });

  try {
    await withDeadline(connection.connect(), params.timeoutMs, "connect");
  } catch (error) {
    connection.disconnect();
    throw mapTarantoolError(error);
  }

  return {
    async call(
      functionName: string,
      args: readonly unknown[],
      options: CallOptions = {},
    ): Promise<unknown> {
      const deadlineMs = params.timeoutMs + (options.waitMs ?? 0);
      try {
        return await withDeadline(
          connection.call(functionName, ...args),
          deadlineMs,
          functionName,
        );
      } catch (error) {
        throw mapTarantoolError(error, functionName);
      }
    },

    close() {
      connection.disconnect();
    },
  };
}

/** Default ConnectionFactory of every Locksmith */
export const tarantoolConnectionFactory: ConnectionFactory =
  createTarantoolCaller;
