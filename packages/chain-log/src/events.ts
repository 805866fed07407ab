// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Chain lifecycle events.
 *
 * `ChainLogEventEmitter` is a typed publish-subscribe bus. The core never
 * logs on its own; hosts subscribe here and forward to their logger. Reset
 * in particular must be recorded on a channel outside the forensic store,
 * because the store cannot attest to its own erasure.
 *
 * ```ts
 * const events = new ChainLogEventEmitter();
 * events.on(EVENT_RESET, (payload) => {
 *   logger.warn(payload, "chain reset");
 * });
 * ```
 */

import type { Hash, LogRecord, VerificationResult } from "./types.js";

/** Emitted after a record has been committed (row written, anchor advanced). */
export const EVENT_APPENDED = "chain:appended" as const;

/** Emitted after the log has been wiped and the anchor returned to genesis. */
export const EVENT_RESET = "chain:reset" as const;

/** Emitted after every verification, whatever its outcome. */
export const EVENT_VERIFIED = "chain:verified" as const;

/** Emitted when a stale anchor has been re-committed to the log tip. */
export const EVENT_ANCHOR_RECOVERED = "chain:anchor-recovered" as const;

export type ChainLogEventName =
  | typeof EVENT_APPENDED
  | typeof EVENT_RESET
  | typeof EVENT_VERIFIED
  | typeof EVENT_ANCHOR_RECOVERED;

export interface ChainAppendedEventPayload {
  readonly record: LogRecord;
  /** ISO 8601 wall-clock time of the commit. */
  readonly timestamp: string;
}

export interface ChainResetEventPayload {
  /** Tip of the chain that was discarded. */
  readonly discardedTip: Hash;
  /** Number of record rows that were discarded. */
  readonly discardedRecords: number;
  readonly timestamp: string;
}

export interface ChainVerifiedEventPayload {
  readonly result: VerificationResult;
  readonly timestamp: string;
}

export interface ChainAnchorRecoveredEventPayload {
  /** The tip the anchor now vouches for. */
  readonly tip: Hash;
  readonly timestamp: string;
}

export interface ChainLogEventPayloadMap {
  [EVENT_APPENDED]: ChainAppendedEventPayload;
  [EVENT_RESET]: ChainResetEventPayload;
  [EVENT_VERIFIED]: ChainVerifiedEventPayload;
  [EVENT_ANCHOR_RECOVERED]: ChainAnchorRecoveredEventPayload;
}

export type ChainLogEventListener<E extends ChainLogEventName> = (
  payload: ChainLogEventPayloadMap[E],
) => void;

type AnyListener = (payload: unknown) => void;

/**
 * Typed synchronous event emitter for chain lifecycle events.
 *
 * Listeners run in registration order. A listener that throws does not stop
 * the others and never fails the operation that emitted the event; its error
 * is handed to `onListenerError`, which defaults to a process warning.
 */
export class ChainLogEventEmitter {
  readonly #listeners: Map<ChainLogEventName, AnyListener[]> = new Map();
  readonly #onListenerError: (error: unknown) => void;

  constructor(options?: { onListenerError?: (error: unknown) => void }) {
    this.#onListenerError = options?.onListenerError ?? reportListenerError;
  }

  on<E extends ChainLogEventName>(event: E, listener: ChainLogEventListener<E>): this {
    const existing = this.#listeners.get(event);
    if (existing !== undefined) {
      existing.push(listener as AnyListener);
    } else {
      this.#listeners.set(event, [listener as AnyListener]);
    }
    return this;
  }

  off<E extends ChainLogEventName>(event: E, listener: ChainLogEventListener<E>): this {
    const entries = this.#listeners.get(event);
    if (entries === undefined) return this;

    const index = entries.indexOf(listener as AnyListener);
    if (index !== -1) {
      entries.splice(index, 1);
    }
    if (entries.length === 0) {
      this.#listeners.delete(event);
    }
    return this;
  }

  /**
   * Invoke every listener for `event` with `payload`.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<E extends ChainLogEventName>(event: E, payload: ChainLogEventPayloadMap[E]): boolean {
    const entries = this.#listeners.get(event);
    if (entries === undefined || entries.length === 0) return false;

    // Snapshot so listeners added or removed during emission do not affect
    // the current call.
    for (const listener of [...entries]) {
      try {
        listener(payload);
      } catch (error) {
        this.#onListenerError(error);
      }
    }
    return true;
  }

  listenerCount(event: ChainLogEventName): number {
    return this.#listeners.get(event)?.length ?? 0;
  }
}

function reportListenerError(error: unknown): void {
  const warning = error instanceof Error ? error : new Error(String(error));
  process.emitWarning(warning, { code: "CHAIN_LOG_LISTENER" });
}
