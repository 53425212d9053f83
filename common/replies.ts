// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Decoders for authority replies. A reply is a list of result tuples and only
 * the first tuple is consulted. Element 0 of that tuple is the success
 * discriminator: any value other than nil means success.
 */

import { LocksmithError } from "./errors.js";
import type { AcquireReply } from "./types.js";

type ReplyTuple = readonly unknown[];

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

/**
 * Returns the first result of a reply, rejecting replies with no results.
 */
function firstResult(functionName: string, reply: unknown): unknown {
  if (!Array.isArray(reply) || reply.length === 0) {
    throw new LocksmithError(
      "MalformedReply",
      `Zero tuple in reply to ${functionName}`,
      { functionName },
    );
  }
  return reply[0];
}

/**
 * Returns the first tuple of a reply. A nil result reads as an empty tuple
 * (discriminator absent).
 */
function firstTuple(functionName: string, reply: unknown): ReplyTuple {
  const result = firstResult(functionName, reply);
  if (!isPresent(result)) {
    return [];
  }
  if (!Array.isArray(result)) {
    throw new LocksmithError(
      "MalformedReply",
      `Bad tuple in reply to ${functionName}: expected a tuple, got ${typeof result}`,
      { functionName },
    );
  }
  return result;
}

/**
 * Decodes `acquire` → `(ok, name, leaseId)`.
 */
export function decodeAcquireReply(
  functionName: string,
  reply: unknown,
): AcquireReply {
  const tuple = firstTuple(functionName, reply);
  if (!isPresent(tuple[0])) {
    return { granted: false };
  }

  const [, name, leaseId] = tuple;
  if (typeof name !== "string" || typeof leaseId !== "string" || !leaseId) {
    throw new LocksmithError(
      "MalformedReply",
      `Bad tuple in reply to ${functionName}: missing lock name or lease id`,
      { functionName },
    );
  }
  return { granted: true, name, leaseId };
}

/**
 * Decodes `update` / `release` → `(ok)`.
 */
export function decodeMutationReply(
  functionName: string,
  reply: unknown,
): boolean {
  return isPresent(firstTuple(functionName, reply)[0]);
}

/**
 * Decodes `statistics` → `(stats)`. The statistics record is owned by the
 * authority and returned verbatim. Authorities that answer with a map instead
 * of a tuple get that map back as is.
 */
export function decodeStatisticsReply(
  functionName: string,
  reply: unknown,
): unknown {
  const result = firstResult(functionName, reply);
  return Array.isArray(result) ? result[0] : result;
}
