// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { REMOTE_FUNCTIONS } from "../../common/constants.js";
import { logger } from "../../common/logger.js";
import { decodeMutationReply } from "../../common/replies.js";
import type { LeaseId, LocksmithConfig } from "../../common/types.js";
import { validateLeaseId } from "../../common/validation.js";
import type { ConnectionManager } from "../connection.js";

/**
 * Creates the release operation. Releasing an unknown, released or expired
 * lease answers false.
 */
export function createReleaseOperation(
  connections: ConnectionManager,
  config: LocksmithConfig,
) {
  const functionName = `${config.namespace}:${REMOTE_FUNCTIONS.release}`;

  return async (leaseId: LeaseId): Promise<boolean> => {
    validateLeaseId(leaseId);

    const connection = await connections.getConnection();
    const ok = decodeMutationReply(
      functionName,
      await connection.call(functionName, [leaseId]),
    );

    logger.debug("release", { leaseId, ok });
    return ok;
  };
}
