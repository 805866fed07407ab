// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { commit, ZERO_HASH } from "../src/chain.js";
import { encodeRecord, LOG_HEADER } from "../src/codec.js";
import type { LogRecord, Reading } from "../src/types.js";

/**
 * Build a self-consistent chain from genesis without going through ChainLog.
 */
export function buildChain(readings: readonly Reading[]): LogRecord[] {
  const records: LogRecord[] = [];
  let prevHash = ZERO_HASH;
  for (const { timestamp, value } of readings) {
    const entryHash = commit(prevHash, timestamp, value);
    records.push({ timestamp, value, prevHash, entryHash });
    prevHash = entryHash;
  }
  return records;
}

export function toLines(records: readonly LogRecord[]): string[] {
  return [LOG_HEADER, ...records.map(encodeRecord)];
}

export function tipOf(records: readonly LogRecord[]): string {
  return records[records.length - 1]?.entryHash ?? ZERO_HASH;
}

export const READINGS: readonly Reading[] = [
  { timestamp: "2024-01-01 00:00:00", value: "20.0" },
  { timestamp: "2024-01-01 00:00:05", value: "20.5" },
  { timestamp: "2024-01-01 00:00:10", value: "20.7" },
  { timestamp: "2024-01-01 00:00:15", value: "20.6" },
];

/**
 * Replace the character at `index` with a different hex digit or letter.
 */
export function flipCharacter(text: string, index: number): string {
  const current = text.charAt(index);
  const replacement = current === "0" ? "1" : "0";
  return text.slice(0, index) + replacement + text.slice(index + 1);
}
