// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { commit, ZERO_HASH } from "./chain.js";
import { decodeRecord, isBlankLine, LOG_HEADER } from "./codec.js";
import type { AnchorState, Hash, LogRecord, VerificationResult } from "./types.js";

/**
 * Replay a log snapshot and check every link, then cross-check the computed
 * tip against the trust anchor.
 *
 * Stops at the first inconsistency: the earliest point of compromise is what
 * matters, and nothing after a broken link can be trusted anyway.
 *
 * @param lines  - Every line of the log store in order, header included.
 * @param anchor - The anchor state captured together with `lines`.
 */
export function verifyLog(lines: readonly string[], anchor: AnchorState): VerificationResult {
  const rows = lines.filter((line) => !isBlankLine(line));

  const header = rows[0];
  if (header === undefined) {
    return {
      status: "tampered",
      position: 0,
      reason: "malformed-header",
      message: "Log is empty; the header row is missing.",
    };
  }
  if (header !== LOG_HEADER) {
    return {
      status: "tampered",
      position: 0,
      reason: "malformed-header",
      message: `Header row is "${header}" but expected "${LOG_HEADER}".`,
    };
  }

  let expected: Hash = ZERO_HASH;
  let last: LogRecord | undefined;
  const recordRows = rows.slice(1);

  for (let index = 0; index < recordRows.length; index++) {
    const position = index + 1;
    const decoded = decodeRecord(recordRows[index] ?? "");

    if (!decoded.ok) {
      return {
        status: "tampered",
        position,
        reason: "malformed-row",
        message: `Record ${position} is malformed: ${decoded.message}.`,
      };
    }

    const record = decoded.record;
    if (record.prevHash !== expected) {
      return {
        status: "tampered",
        position,
        reason: "link-broken",
        message: `Record ${position} has prevHash "${record.prevHash}" but expected "${expected}".`,
      };
    }

    const recomputed = commit(record.prevHash, record.timestamp, record.value);
    if (recomputed !== record.entryHash) {
      return {
        status: "tampered",
        position,
        reason: "hash-mismatch",
        message: `Record ${position} has entryHash "${record.entryHash}" but recomputed hash is "${recomputed}". Record content may have been altered.`,
      };
    }

    expected = record.entryHash;
    last = record;
  }

  const length = recordRows.length;

  if (expected === anchor.committed) {
    return { status: "verified", length };
  }

  // A commit interrupted between writing its row and committing the anchor
  // leaves exactly one intact row beyond the committed tip, announced by the
  // pending marker.
  if (
    last !== undefined &&
    anchor.pending !== null &&
    expected === anchor.pending &&
    last.prevHash === anchor.committed
  ) {
    return { status: "anchor-stale", length, tip: expected, anchor: anchor.committed };
  }

  return {
    status: "tampered",
    position: length + 1,
    reason: "anchor-mismatch",
    message: `Computed tip "${expected}" does not match trust anchor "${anchor.committed}". The log may have been replaced or rolled back.`,
  };
}
