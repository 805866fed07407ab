// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { AnchorStore } from "./anchor/interface.js";
import { GENESIS_ANCHOR } from "./anchor/state.js";
import { commit, ZERO_HASH } from "./chain.js";
import { decodeRecord, encodeRecord, isBlankLine, LOG_HEADER } from "./codec.js";
import { CommitQueue } from "./commit-queue.js";
import { ChainStateError } from "./errors.js";
import {
  ChainLogEventEmitter,
  EVENT_ANCHOR_RECOVERED,
  EVENT_APPENDED,
  EVENT_RESET,
  EVENT_VERIFIED,
} from "./events.js";
import type { LogStore } from "./storage/interface.js";
import type {
  AnchorState,
  Hash,
  InitializeOutcome,
  InspectedRow,
  LogRecord,
  VerificationResult,
} from "./types.js";
import { verifyLog } from "./verifier.js";

/**
 * Configuration for constructing a ChainLog.
 */
export interface ChainLogOptions {
  /** Line store holding the log rows. */
  readonly log: LogStore;
  /** Trust anchor cell, kept outside the log's storage medium. */
  readonly anchor: AnchorStore;
  /** Event bus to publish lifecycle events on. A private one is created when omitted. */
  readonly events?: ChainLogEventEmitter;
  /** Wall clock used for event timestamps. Defaults to `new Date().toISOString()`. */
  readonly now?: () => string;
}

/**
 * Primary entry point: the sole writer of the log and its trust anchor.
 *
 * ChainLog coordinates three concerns:
 * 1. Linking: every appended record commits to its predecessor's hash.
 * 2. Anchoring: every commit advances the trust anchor in a separate store.
 * 3. Auditing: `verify` replays the whole log and checks it against the anchor.
 *
 * Appends, resets and verification snapshots are serialised through one
 * queue, so verification always sees a log and an anchor from the same
 * moment.
 *
 * ```typescript
 * const chain = new ChainLog({ log: new MemoryLogStore(), anchor: new MemoryAnchorStore() });
 * await chain.initialize();
 * await chain.append("2024-01-01 00:00:00", "20.0");
 * const result = await chain.verify();
 * ```
 */
export class ChainLog {
  readonly events: ChainLogEventEmitter;

  private readonly log: LogStore;
  private readonly anchor: AnchorStore;
  private readonly now: () => string;
  private readonly queue = new CommitQueue();

  constructor(options: ChainLogOptions) {
    this.log = options.log;
    this.anchor = options.anchor;
    this.events = options.events ?? new ChainLogEventEmitter();
    this.now = options.now ?? (() => new Date().toISOString());
  }

  /**
   * Bootstrap a fresh chain on first boot.
   *
   * Writes the header row when the log store is empty and the anchor has
   * never been committed to. Anything else is left untouched: an empty log
   * next to a non-genesis anchor is evidence for `verify`, not something to
   * paper over.
   */
  async initialize(): Promise<InitializeOutcome> {
    return this.queue.run(async () => {
      const lines = await this.log.readLines();
      const anchor = await this.anchor.get();
      const untouched = anchor.committed === ZERO_HASH && anchor.pending === null;
      if (lines.every(isBlankLine) && untouched) {
        await this.log.rewrite([LOG_HEADER]);
        return "bootstrapped";
      }
      return "existing";
    });
  }

  /**
   * Commit one reading.
   *
   * The row is written between two anchor updates: first a pending marker
   * naming the new entry hash, then the committed tip. An interruption after
   * the row landed is reported by `verify` as `anchor-stale` instead of
   * tampering.
   *
   * @throws ChainStateError when the log has no header, its last row cannot
   *         be decoded, or its tip is not vouched for by the anchor.
   * @throws InvalidFieldError when `timestamp` or `value` contains a comma
   *         or a line break. Nothing is written in that case.
   * @throws StorageError when either store fails. The commit did not happen.
   */
  async append(timestamp: string, value: string): Promise<LogRecord> {
    return this.queue.run(async () => {
      const tip = await this.readTip();
      const anchor = await this.anchor.get();
      if (tip !== anchor.committed && tip !== anchor.pending) {
        throw new ChainStateError(
          "ANCHOR_DIVERGED",
          `Log tip "${tip}" is not vouched for by trust anchor "${anchor.committed}". Run verify before appending.`,
        );
      }

      const record: LogRecord = {
        timestamp,
        value,
        prevHash: tip,
        entryHash: commit(tip, timestamp, value),
      };
      const row = encodeRecord(record);

      await this.anchor.set({ committed: tip, pending: record.entryHash });
      await this.log.appendLine(row);
      await this.anchor.set({ committed: record.entryHash, pending: null });

      this.events.emit(EVENT_APPENDED, { record, timestamp: this.now() });
      return record;
    });
  }

  /**
   * Verify the whole log against the trust anchor.
   *
   * The log lines and the anchor are captured together inside the commit
   * queue; the replay itself runs on that snapshot. Tampering is reported in
   * the result, never thrown.
   *
   * @throws StorageError when the snapshot cannot be read.
   */
  async verify(): Promise<VerificationResult> {
    const { lines, anchor } = await this.queue.run(() => this.snapshot());
    const result = verifyLog(lines, anchor);
    this.events.emit(EVENT_VERIFIED, { result, timestamp: this.now() });
    return result;
  }

  /**
   * Discard the entire history and start a new chain from genesis.
   *
   * This is the only operation that removes rows. It emits `chain:reset` so
   * that the host can record the erasure somewhere other than the log.
   */
  async reset(): Promise<void> {
    return this.queue.run(async () => {
      const lines = await this.log.readLines();
      const discarded = lines.filter((line) => !isBlankLine(line) && line !== LOG_HEADER);
      const previousAnchor = await this.anchor.get();

      await this.log.rewrite([LOG_HEADER]);
      await this.anchor.set(GENESIS_ANCHOR);

      this.events.emit(EVENT_RESET, {
        discardedTip: previousAnchor.committed,
        discardedRecords: discarded.length,
        timestamp: this.now(),
      });
    });
  }

  /**
   * Re-commit the anchor after an interrupted append.
   *
   * Only acts when verification reports `anchor-stale`; the anchor is then
   * moved to the log tip and the result becomes `verified`. Every other
   * result is returned as is.
   */
  async recoverAnchor(): Promise<VerificationResult> {
    return this.queue.run(async () => {
      const { lines, anchor } = await this.snapshot();
      const result = verifyLog(lines, anchor);
      if (result.status !== "anchor-stale") {
        return result;
      }

      await this.anchor.set({ committed: result.tip, pending: null });
      this.events.emit(EVENT_ANCHOR_RECOVERED, { tip: result.tip, timestamp: this.now() });
      return { status: "verified", length: result.length };
    });
  }

  /**
   * Return the hash of the last record in the log, or the genesis hash when
   * the log holds no records.
   *
   * @throws ChainStateError when the log has no header or its last row
   *         cannot be decoded.
   */
  async currentTip(): Promise<Hash> {
    return this.readTip();
  }

  /**
   * Return the stored trust anchor state, for diagnostics.
   */
  async anchorState(): Promise<AnchorState> {
    return this.anchor.get();
  }

  /**
   * Decode every record row without checking links, for read-only display.
   * Positions match the ones reported by `verify`.
   */
  async inspect(): Promise<InspectedRow[]> {
    const lines = await this.log.readLines();
    const rows = lines.filter((line) => !isBlankLine(line));
    const records = rows[0] === LOG_HEADER ? rows.slice(1) : rows;

    return records.map((raw, index): InspectedRow => {
      const position = index + 1;
      const decoded = decodeRecord(raw);
      return decoded.ok
        ? { position, ok: true, record: decoded.record }
        : { position, ok: false, raw, message: decoded.message };
    });
  }

  private async snapshot(): Promise<{ lines: string[]; anchor: AnchorState }> {
    const lines = await this.log.readLines();
    const anchor = await this.anchor.get();
    return { lines, anchor };
  }

  private async readTip(): Promise<Hash> {
    const last = await this.log.lastLine();
    if (last === null) {
      throw new ChainStateError(
        "LOG_NOT_INITIALIZED",
        "Log store is empty; call initialize() or reset() first.",
      );
    }
    if (last === LOG_HEADER) {
      return ZERO_HASH;
    }

    const decoded = decodeRecord(last);
    if (!decoded.ok) {
      throw new ChainStateError("TIP_UNREADABLE", `Last log row cannot be decoded: ${decoded.message}.`);
    }
    return decoded.record.entryHash;
  }
}
