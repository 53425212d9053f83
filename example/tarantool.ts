// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Locksmith against a Tarantool authority exposing the locksmith:* functions.
 * Connection settings come from LOCKSMITH_HOST, LOCKSMITH_PORT,
 * LOCKSMITH_USER, LOCKSMITH_PASSWORD and LOCKSMITH_TIMEOUT_MS.
 */

import {
  createLocksmith,
  locksmithOptionsFromEnv,
  LocksmithError,
  withTelemetry,
} from "../index.js";

const client = createLocksmith(locksmithOptionsFromEnv());
const locksmith = withTelemetry(client, {
  onEvent: (event) => console.log("[lease]", event),
});

async function main() {
  try {
    const lease = await locksmith.acquire("foo", 60);
    if (!lease) {
      console.log("foo is held elsewhere");
      return;
    }
    console.log(`Acquired ${lease}`);

    // Someone else asking without waiting gets null, not an error
    console.log("Second acquire:", await locksmith.acquire("foo", 60, 0));

    await lease.update(30);
    console.log("Released:", await lease.release());
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof LocksmithError && error.code === "NetworkError") {
    console.error("Authority unreachable:", error.message);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
