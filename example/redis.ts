// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Running a Locksmith against Redis instead of Tarantool.
 * The Redis authority serves the same remote functions, so only the
 * connection factory changes.
 */

import { Redis } from "ioredis";
import { createLocksmith, withLease } from "../index.js";
import { createRedisCaller } from "../redis/index.js";

const redis = new Redis({
  host: "localhost",
  port: 6379,
  // For hosted Redis add: password, tls: {}
});

const locksmith = createLocksmith({
  connectionFactory: () =>
    createRedisCaller(redis, { keyPrefix: "myapp:locks" }),
});

// Example 1: scoped lease
async function rebuildSearchIndex(shard: string) {
  return withLease(
    locksmith,
    `search:reindex:${shard}`,
    async () => {
      console.log(`Reindexing shard ${shard}`);
      return { shard, documents: 1200 };
    },
    { validity: 120, timeout: 10 },
  );
}

// Example 2: manual lease with renewal
async function runLongImport(batchIds: string[]) {
  const lease = await locksmith.acquire("imports:catalog", 30, 0);
  if (!lease) {
    console.log("Another worker is importing");
    return;
  }

  try {
    for (const batchId of batchIds) {
      console.log(`Importing batch ${batchId}`);
      if (!(await lease.update(30))) {
        throw new Error(`Lost ${lease} while importing`);
      }
    }
  } finally {
    await lease.release();
  }
}

async function main() {
  try {
    console.log(await rebuildSearchIndex("eu-1"));
    await runLongImport(["b1", "b2", "b3"]);
    console.log("Statistics:", await locksmith.statistics());
  } finally {
    redis.disconnect();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
