// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Deliberate chain violations for demonstrating the verifier.
 *
 * Everything here writes to the raw line store. Nothing imports ChainLog or
 * an anchor store, so none of these paths can advance the trust anchor or be
 * reached from a legitimate append. Each operation mirrors something an
 * attacker with write access to the log medium could do.
 */

import {
  commit,
  encodeRecord,
  FIELD_DELIMITER,
  isBlankLine,
  LOG_HEADER,
  type LogStore,
  type Reading,
  ZERO_HASH,
} from "@sensorchain/chain-log";

export const RECORD_FIELDS = ["timestamp", "value", "prevHash", "entryHash"] as const;

export type RecordField = (typeof RECORD_FIELDS)[number];

/** prevHash given to injected rows; no genuine entry hashes to it. */
const UNLINKED_PREV_HASH = "f".repeat(64);

export class ChainAttacks {
  private readonly store: LogStore;

  constructor(store: LogStore) {
    this.store = store;
  }

  /**
   * Copy of every line currently in the store, for a later rollback.
   */
  async snapshot(): Promise<string[]> {
    return this.store.readLines();
  }

  /**
   * Overwrite one field of the record at `position` without recomputing any
   * hash.
   *
   * @returns The row as written.
   */
  async editField(position: number, field: RecordField, replacement: string): Promise<string> {
    const lines = await this.store.readLines();
    const index = locateRecord(lines, position);
    const fields = (lines[index] ?? "").split(FIELD_DELIMITER);
    if (fields.length !== RECORD_FIELDS.length) {
      throw new RangeError(`Record ${position} does not have ${RECORD_FIELDS.length} fields to edit.`);
    }

    fields[RECORD_FIELDS.indexOf(field)] = replacement;
    const row = fields.join(FIELD_DELIMITER);
    lines[index] = row;
    await this.store.rewrite(lines);
    return row;
  }

  /**
   * Replace the record at `position` with an arbitrary row.
   */
  async substituteRow(position: number, row: string): Promise<void> {
    const lines = await this.store.readLines();
    lines[locateRecord(lines, position)] = row;
    await this.store.rewrite(lines);
  }

  /**
   * Append a well-formed row whose own hash is correct but whose prevHash
   * does not point at the current tip.
   *
   * @returns The row as written.
   */
  async appendUnlinked(reading: Reading): Promise<string> {
    const row = encodeRecord({
      timestamp: reading.timestamp,
      value: reading.value,
      prevHash: UNLINKED_PREV_HASH,
      entryHash: commit(UNLINKED_PREV_HASH, reading.timestamp, reading.value),
    });
    await this.store.appendLine(row);
    return row;
  }

  /**
   * Append a row carrying only the reading, with both hash fields omitted.
   *
   * @returns The row as written.
   */
  async appendWithoutHashes(reading: Reading): Promise<string> {
    const row = [reading.timestamp, reading.value].join(FIELD_DELIMITER);
    await this.store.appendLine(row);
    return row;
  }

  /**
   * Replace the whole store with a freshly computed, internally consistent
   * chain over `readings`.
   *
   * @returns The lines written, header included.
   */
  async forgeChain(readings: readonly Reading[]): Promise<string[]> {
    const lines = [LOG_HEADER];
    let prevHash = ZERO_HASH;
    for (const { timestamp, value } of readings) {
      const entryHash = commit(prevHash, timestamp, value);
      lines.push(encodeRecord({ timestamp, value, prevHash, entryHash }));
      prevHash = entryHash;
    }
    await this.store.rewrite(lines);
    return lines;
  }

  /**
   * Replace the whole store with `lines`, e.g. an earlier snapshot.
   */
  async overwrite(lines: readonly string[]): Promise<void> {
    await this.store.rewrite(lines);
  }
}

/**
 * Index into `lines` of the record at 1-based `position`, counting the way
 * the verifier does: blank lines skipped, first non-blank line is the header.
 */
export function locateRecord(lines: readonly string[], position: number): number {
  if (!Number.isInteger(position) || position < 1) {
    throw new RangeError(`Record position must be a positive integer, received ${String(position)}.`);
  }

  let seen = -1;
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    if (line === undefined || isBlankLine(line)) continue;
    seen++;
    if (seen === position) return index;
  }
  throw new RangeError(`The log has no record at position ${position}.`);
}
