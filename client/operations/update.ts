// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { REMOTE_FUNCTIONS } from "../../common/constants.js";
import { logger } from "../../common/logger.js";
import { decodeMutationReply } from "../../common/replies.js";
import type { LeaseId, LocksmithConfig } from "../../common/types.js";
import {
  validateLeaseId,
  validateValidity,
} from "../../common/validation.js";
import type { ConnectionManager } from "../connection.js";

/**
 * Creates the update operation: extends a live lease to `validity` seconds from now.
 */
export function createUpdateOperation(
  connections: ConnectionManager,
  config: LocksmithConfig,
) {
  const functionName = `${config.namespace}:${REMOTE_FUNCTIONS.update}`;

  return async (leaseId: LeaseId, validity: number): Promise<boolean> => {
    validateLeaseId(leaseId);
    validateValidity(validity);

    const connection = await connections.getConnection();
    const ok = decodeMutationReply(
      functionName,
      await connection.call(functionName, [leaseId, validity]),
    );

    logger.debug("update", { leaseId, ok });
    return ok;
  };
}
