// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Contract every log backend must satisfy.
 *
 * The store is line-oriented and knows nothing about records or hashes.
 * `ChainLog` only ever appends; `rewrite` exists for reset.
 */
export interface LogStore {
  /**
   * Return every line in order, without line terminators. A missing store
   * yields an empty array.
   */
  readLines(): Promise<string[]>;

  /**
   * Return the last line that is not blank, or `null` when there is none.
   */
  lastLine(): Promise<string | null>;

  /**
   * Append one line. Readers must never observe a partially written line.
   */
  appendLine(line: string): Promise<void>;

  /**
   * Replace the entire content with `lines`.
   */
  rewrite(lines: readonly string[]): Promise<void>;
}

export function assertSingleLine(line: string): void {
  if (/[\r\n]/.test(line)) {
    throw new RangeError("A log line must not contain line breaks.");
  }
}
