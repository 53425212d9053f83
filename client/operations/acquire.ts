// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { REMOTE_FUNCTIONS } from "../../common/constants.js";
import { logger } from "../../common/logger.js";
import { decodeAcquireReply } from "../../common/replies.js";
import type {
  Locksmith,
  LocksmithConfig,
  LockName,
} from "../../common/types.js";
import {
  validateLockName,
  validateTimeout,
  validateValidity,
} from "../../common/validation.js";
import type { ConnectionManager } from "../connection.js";
import { Lease } from "../../common/lease.js";

/**
 * Creates the acquire operation. Waiting under contention is delegated to the
 * authority through `timeout`; the client makes exactly one call.
 *
 * Call shape: `(name, validity)` when timeout is undefined,
 * `(name, validity, timeout)` otherwise.
 */
export function createAcquireOperation(
  connections: ConnectionManager,
  config: LocksmithConfig,
  owner: () => Locksmith,
) {
  const functionName = `${config.namespace}:${REMOTE_FUNCTIONS.acquire}`;

  return async (
    name: LockName,
    validity: number,
    timeout?: number,
  ): Promise<Lease | null> => {
    validateLockName(name);
    validateValidity(validity);
    validateTimeout(timeout);

    const args = timeout === undefined ? [name, validity] : [name, validity, timeout];
    const waitMs = timeout === undefined ? Infinity : timeout * 1000;

    const connection = await connections.getConnection();
    const reply = decodeAcquireReply(
      functionName,
      await connection.call(functionName, args, { waitMs }),
    );

    logger.debug("acquire", { name, granted: reply.granted });
    if (!reply.granted) {
      return null;
    }
    return new Lease(owner(), reply.name, reply.leaseId);
  };
}
