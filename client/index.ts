// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { createLocksmithConfig, locksmithOptionsFromEnv } from "./config.js";
export { createConnectionManager } from "./connection.js";
export type { ConnectionManager } from "./connection.js";
export { createLocksmith } from "./locksmith.js";
export type { LocksmithClient } from "./locksmith.js";
