// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { REMOTE_FUNCTIONS } from "../../common/constants.js";
import { decodeStatisticsReply } from "../../common/replies.js";
import type { LocksmithConfig } from "../../common/types.js";
import type { ConnectionManager } from "../connection.js";

export function createStatisticsOperation(
  connections: ConnectionManager,
  config: LocksmithConfig,
) {
  const functionName = `${config.namespace}:${REMOTE_FUNCTIONS.statistics}`;

  return async (): Promise<unknown> => {
    const connection = await connections.getConnection();
    return decodeStatisticsReply(
      functionName,
      await connection.call(functionName, []),
    );
  };
}
