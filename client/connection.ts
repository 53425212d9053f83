// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createAsyncLock, isAsyncLock } from "../common/async-lock.js";
import { LocksmithError } from "../common/errors.js";
import { logger } from "../common/logger.js";
import type {
  AsyncLock,
  ConnectionFactory,
  ConnectionParams,
  RemoteCaller,
} from "../common/types.js";
import { tarantoolConnectionFactory } from "../tarantool/connection.js";

/**
 * Owns the single channel of one coordinator.
 */
export interface ConnectionManager {
  /** Returns the shared channel, building it on first use */
  getConnection(): Promise<RemoteCaller>;
  /** Swap the transport; `null` restores the Tarantool default. Drops the current channel; close() still reaches it. */
  setConnectionFactory(factory: ConnectionFactory | null): void;
  /** Swap the construction lock; `null` restores the default */
  setMutex(mutex: AsyncLock | null): void;
  /** Close and forget the current channel and every channel dropped by a swap */
  close(): Promise<void>;
}

function isRemoteCaller(value: unknown): value is RemoteCaller {
  return (
    typeof value === "object" &&
    value !== null &&
    "call" in value &&
    typeof value.call === "function"
  );
}

// Run-time checks cover untyped callers; typed callers are checked by the compiler.
function checkFactory(factory: ConnectionFactory): ConnectionFactory {
  if (typeof factory !== "function") {
    throw new LocksmithError(
      "InvalidConfiguration",
      "Connection factory must be a function returning a caller with a call() method, or null",
    );
  }
  return factory;
}

function checkMutex(mutex: AsyncLock): AsyncLock {
  if (!isAsyncLock(mutex)) {
    throw new LocksmithError(
      "InvalidConfiguration",
      "Mutex must have a runExclusive() method, or be null",
    );
  }
  return mutex;
}

/**
 * Creates a connection manager with lazy, double-checked channel construction:
 * check unset → enter lock → re-check unset → construct → leave lock.
 * The lock guards construction only; remote calls never run under it.
 *
 * @param params - Frozen construction parameters handed to the factory
 * @param options - Optional transport and lock substitutes
 */
export function createConnectionManager(
  params: ConnectionParams,
  options: { connectionFactory?: ConnectionFactory; mutex?: AsyncLock } = {},
): ConnectionManager {
  const state: {
    factory: ConnectionFactory;
    mutex: AsyncLock;
    connection: RemoteCaller | undefined;
    generation: number;
    /** Channels dropped or built under an older generation, closed by close() */
    retired: Set<RemoteCaller>;
  } = {
    factory:
      options.connectionFactory === undefined
        ? tarantoolConnectionFactory
        : checkFactory(options.connectionFactory),
    mutex:
      options.mutex === undefined ? createAsyncLock() : checkMutex(options.mutex),
    connection: undefined,
    generation: 0,
    retired: new Set(),
  };

  const construct = async (): Promise<RemoteCaller> => {
    if (state.connection) {
      return state.connection;
    }

    const generation = state.generation;
    logger.debug("Opening connection", {
      host: params.host,
      port: params.port,
    });
    const connection = await state.factory(params);
    if (!isRemoteCaller(connection)) {
      throw new LocksmithError(
        "InvalidConfiguration",
        "Connection factory returned an object without a call() method",
      );
    }

    // Factory swapped while we were connecting: hand out this channel once, keep none
    if (generation === state.generation) {
      state.connection = connection;
    } else {
      state.retired.add(connection);
    }
    return connection;
  };

  return {
    async getConnection() {
      if (state.connection) {
        return state.connection;
      }
      return state.mutex.runExclusive(construct);
    },

    setConnectionFactory(factory) {
      state.factory =
        factory === null ? tarantoolConnectionFactory : checkFactory(factory);
      if (state.connection) {
        state.retired.add(state.connection);
      }
      state.connection = undefined;
      state.generation++;
    },

    setMutex(mutex) {
      state.mutex = mutex === null ? createAsyncLock() : checkMutex(mutex);
    },

    async close() {
      const connections = [...state.retired];
      if (state.connection) {
        connections.push(state.connection);
      }
      state.retired.clear();
      state.connection = undefined;
      state.generation++;
      for (const connection of connections) {
        await connection.close?.();
      }
    },
  };
}
