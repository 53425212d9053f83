// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { randomUUID } from "node:crypto";

/**
 * Generates a lease id for authorities hosted by this library (UUID v4).
 */
export function generateLeaseId(): string {
  return randomUUID();
}

/**
 * 96-bit hash for lock names and lease ids in telemetry (24 hex chars).
 *
 * @remarks Non-cryptographic: for redaction in logs and events only.
 */
export function hashKey(value: string): string {
  const normalizedValue = value.normalize("NFC");

  // Triple-hash (3x32-bit = 96 bits)
  let h1 = 0,
    h2 = 0,
    h3 = 0;

  for (let i = 0; i < normalizedValue.length; i++) {
    const char = normalizedValue.charCodeAt(i);
    h1 = ((h1 << 5) - h1 + char) | 0;
    h2 = ((h2 << 7) - h2 + char * 3) | 0;
    h3 = ((h3 << 11) - h3 + char * 7) | 0;
  }

  const p1 = (h1 >>> 0).toString(16).padStart(8, "0");
  const p2 = (h2 >>> 0).toString(16).padStart(8, "0");
  const p3 = (h3 >>> 0).toString(16).padStart(8, "0");

  return p1 + p2 + p3;
}
