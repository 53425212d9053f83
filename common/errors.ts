// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Thrown for configuration faults, transport failures and malformed replies.
 * Losing a lock race or touching an expired lease is not an error: those
 * outcomes are reported as `null` / `false` by the operations themselves.
 */
export class LocksmithError extends Error {
  constructor(
    public code:
      | "InvalidConfiguration" // Bad constructor options or substitutes
      | "InvalidArgument" // Empty name/leaseId, non-positive validity
      | "NetworkError" // Authority unreachable, socket failure, round-trip timeout
      | "RemoteError" // Authority reported an application-level fault
      | "MalformedReply" // Reply does not have the expected tuple shape
      | "Locked", // withLease() could not acquire the lock
    message?: string,
    /** Debugging context: lock name, lease id, remote function and underlying error */
    public context?: {
      name?: string;
      leaseId?: string;
      functionName?: string;
      cause?: unknown;
    },
  ) {
    super(message ?? code);
    this.name = "LocksmithError";
  }
}
