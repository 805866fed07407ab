// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { createHash } from "node:crypto";
import type { Hash } from "./types.js";

/**
 * The hash value that precedes the very first record in any chain.
 * It has the shape of a real SHA-256 hex digest so that genesis links pass
 * the same structural checks as every other link.
 */
export const ZERO_HASH: Hash = "0".repeat(64);

const HASH_PATTERN = /^[0-9a-f]{64}$/;

export function isHash(value: string): boolean {
  return HASH_PATTERN.test(value);
}

/**
 * Compute the commitment hash of an entry.
 *
 * The input is `<prevHash><timestamp>,<value>`. The previous hash has a fixed
 * length, so the boundary between it and the timestamp is unambiguous, and
 * neither text field may contain the comma.
 */
export function commit(prevHash: Hash, timestamp: string, value: string): Hash {
  return createHash("sha256")
    .update(prevHash + timestamp + "," + value, "utf8")
    .digest("hex");
}
