// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  AsyncLock,
  ConnectionFactory,
  Locksmith,
  LocksmithConfig,
  LocksmithOptions,
  RemoteCaller,
} from "../common/types.js";
import { createLocksmithConfig } from "./config.js";
import { createConnectionManager } from "./connection.js";
import {
  createAcquireOperation,
  createReleaseOperation,
  createStatisticsOperation,
  createUpdateOperation,
} from "./operations/index.js";

/**
 * Locksmith plus control over its channel to the authority.
 */
export interface LocksmithClient extends Locksmith {
  readonly config: LocksmithConfig;
  /** Shared channel, opened on first use */
  getConnection(): Promise<RemoteCaller>;
  /** Substitute the transport; `null` restores Tarantool. Drops the current channel. */
  setConnectionFactory(factory: ConnectionFactory | null): void;
  /** Substitute the construction lock; `null` restores the default */
  setMutex(mutex: AsyncLock | null): void;
  close(): Promise<void>;
}

/**
 * Creates a lock coordinator for a remote lock authority.
 *
 * Nothing is opened here: the channel is built on the first operation and
 * shared by every concurrent caller afterwards. Network and remote errors
 * from the transport reach the caller unchanged; the client never retries.
 *
 * @param options - Host, port, credentials, timeout and optional substitutes
 * @throws {LocksmithError} InvalidConfiguration for invalid options
 * @example
 * ```typescript
 * const locksmith = createLocksmith({ host: "127.0.0.1", port: 33013 });
 * const lease = await locksmith.acquire("foo", 60);
 * if (lease) {
 *   await lease.update(30);
 *   await lease.release();
 * }
 * ```
 */
export function createLocksmith(
  options: LocksmithOptions = {},
): LocksmithClient {
  const config = createLocksmithConfig(options);
  const connections = createConnectionManager(config.connection, {
    connectionFactory: options.connectionFactory,
    mutex: options.mutex,
  });

  const locksmith: LocksmithClient = {
    config,
    acquire: createAcquireOperation(connections, config, () => locksmith),
    update: createUpdateOperation(connections, config),
    release: createReleaseOperation(connections, config),
    statistics: createStatisticsOperation(connections, config),
    getConnection: () => connections.getConnection(),
    setConnectionFactory: (factory) => connections.setConnectionFactory(factory),
    setMutex: (mutex) => connections.setMutex(mutex),
    close: () => connections.close(),
  };

  return locksmith;
}
