// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Building blocks for custom transports and authorities.
 */

export * from "./async-lock.js";
export * from "./constants.js";
export * from "./crypto.js";
export * from "./errors.js";
export * from "./helpers.js";
export * from "./lease.js";
export * from "./logger.js";
export * from "./replies.js";
export * from "./telemetry.js";
export * from "./types.js";
export * from "./validation.js";
