// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Lower-case hex rendering of a SHA-256 digest (64 characters).
 */
export type Hash = string;

/**
 * One committed sensor reading, linked to its predecessor.
 * Fields are readonly to prevent accidental mutation after creation.
 */
export interface LogRecord {
  readonly timestamp: string;
  readonly value: string;
  readonly prevHash: Hash;
  readonly entryHash: Hash;
}

/**
 * A single sample produced by a clock/sensor source. Both fields are opaque
 * to the chain; they only have to be free of the row delimiter.
 */
export interface Reading {
  readonly timestamp: string;
  readonly value: string;
}

/**
 * Durable trust anchor contents.
 *
 * `committed` is the tip the last completed commit vouched for. `pending` is
 * set while an append is in flight and cleared once the row has landed.
 */
export interface AnchorState {
  readonly committed: Hash;
  readonly pending: Hash | null;
}

/**
 * Why verification stopped.
 */
export type TamperReason =
  | "malformed-header"
  | "malformed-row"
  | "link-broken"
  | "hash-mismatch"
  | "anchor-mismatch";

/**
 * Outcome of replaying the log.
 *
 * `position` is the 1-based record number where the first inconsistency was
 * found; `0` designates the header row and `length + 1` the anchor check.
 * `anchor-stale` means the log is intact and one row ahead of the anchor
 * because a commit was interrupted after its row was written.
 */
export type VerificationResult =
  | { readonly status: "verified"; readonly length: number }
  | {
      readonly status: "tampered";
      readonly position: number;
      readonly reason: TamperReason;
      readonly message: string;
    }
  | {
      readonly status: "anchor-stale";
      readonly length: number;
      readonly tip: Hash;
      readonly anchor: Hash;
    };

/**
 * A record row as seen by read-only inspection.
 */
export type InspectedRow =
  | { readonly position: number; readonly ok: true; readonly record: LogRecord }
  | { readonly position: number; readonly ok: false; readonly raw: string; readonly message: string };

/**
 * What `ChainLog.initialize` found on disk.
 */
export type InitializeOutcome = "bootstrapped" | "existing";
