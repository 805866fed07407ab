// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from "zod";
import { isHash, ZERO_HASH } from "../chain.js";
import type { AnchorState } from "../types.js";

const HashSchema = z.string().refine(isHash, {
  message: "must be 64 lower-case hex characters",
});

/**
 * Zod schema for the persisted anchor cell.
 */
export const AnchorStateSchema = z.object({
  committed: HashSchema,
  pending: HashSchema.nullable(),
});

/** Anchor value of a chain that has never been committed to. */
export const GENESIS_ANCHOR: AnchorState = Object.freeze({
  committed: ZERO_HASH,
  pending: null,
});

export function encodeAnchorState(state: AnchorState): string {
  return JSON.stringify({ committed: state.committed, pending: state.pending });
}

/**
 * Parse a persisted anchor cell, returning `null` when it is not a valid
 * anchor state.
 */
export function decodeAnchorState(raw: string): AnchorState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = AnchorStateSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
