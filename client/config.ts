// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LOCKSMITH_DEFAULTS, MAX_PORT } from "../common/constants.js";
import { LocksmithError } from "../common/errors.js";
import type { LocksmithConfig, LocksmithOptions } from "../common/types.js";

function invalid(message: string): LocksmithError {
  return new LocksmithError("InvalidConfiguration", message);
}

/**
 * Merges user options with defaults and validates them.
 * Substitutes (connectionFactory, mutex) are validated by the connection manager.
 *
 * @throws {LocksmithError} InvalidConfiguration on the first invalid option
 */
export function createLocksmithConfig(
  options: LocksmithOptions = {},
): LocksmithConfig {
  const host = options.host ?? LOCKSMITH_DEFAULTS.host;
  const port = options.port ?? LOCKSMITH_DEFAULTS.port;
  const timeoutMs = options.timeoutMs ?? LOCKSMITH_DEFAULTS.timeoutMs;
  const namespace = options.namespace ?? LOCKSMITH_DEFAULTS.namespace;

  if (typeof host !== "string" || host.length === 0) {
    throw invalid("Host and port params must be not empty");
  }
  if (!Number.isInteger(port)) {
    throw invalid(`Port must be an integer (current: ${port})`);
  }
  if (port <= 0 || port > MAX_PORT) {
    throw invalid(`Port must be between 1 and ${MAX_PORT} (current: ${port})`);
  }
  if (options.user !== undefined && typeof options.user !== "string") {
    throw invalid("user must be a string");
  }
  if (options.password !== undefined && typeof options.password !== "string") {
    throw invalid("password must be a string");
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw invalid(`timeoutMs must be a positive number (current: ${timeoutMs})`);
  }
  if (typeof namespace !== "string" || namespace.length === 0) {
    throw invalid("namespace must be a non-empty string");
  }

  return Object.freeze({
    connection: Object.freeze({
      host,
      port,
      user: options.user,
      password: options.password,
      timeoutMs,
    }),
    namespace,
  });
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw invalid(`${name} must be a number (current: ${raw})`);
  }
  return value;
}

/**
 * Reads connection options from LOCKSMITH_* environment variables.
 * Unset variables are omitted so createLocksmithConfig() applies defaults.
 */
export function locksmithOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): LocksmithOptions {
  const options: LocksmithOptions = {};
  if (env.LOCKSMITH_HOST !== undefined) options.host = env.LOCKSMITH_HOST;
  if (env.LOCKSMITH_PORT !== undefined) {
    options.port = parseNumber("LOCKSMITH_PORT", env.LOCKSMITH_PORT);
  }
  if (env.LOCKSMITH_USER !== undefined) options.user = env.LOCKSMITH_USER;
  if (env.LOCKSMITH_PASSWORD !== undefined) {
    options.password = env.LOCKSMITH_PASSWORD;
  }
  if (env.LOCKSMITH_TIMEOUT_MS !== undefined) {
    options.timeoutMs = parseNumber(
      "LOCKSMITH_TIMEOUT_MS",
      env.LOCKSMITH_TIMEOUT_MS,
    );
  }
  return options;
}
