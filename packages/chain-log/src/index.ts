// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @sensorchain/chain-log: tamper-evident hash-chain log for sensor readings.
 *
 * Public API surface:
 *
 *   Classes:
 *     ChainLog              Append engine and verifier: initialize(), append(), verify(),
 *                           reset(), recoverAnchor(), currentTip(), anchorState(), inspect()
 *     ChainLogEventEmitter  Typed lifecycle events (appended, reset, verified, anchor-recovered)
 *     CommitQueue           Serialises commits and snapshots
 *     MemoryLogStore        Volatile line store
 *     FileLogStore          Append-only plain-text file store
 *     MemoryAnchorStore     Volatile anchor cell
 *     FileAnchorStore       Crash-consistent anchor file
 *     RedisAnchorStore      Anchor cell on any Redis-compatible client
 *
 *   Functions:
 *     commit, isHash              Chain hasher
 *     encodeRecord, decodeRecord  Record codec
 *     verifyLog                   Pure verification over a snapshot
 *     createFileChainLog          File-backed ChainLog from validated config
 *
 *   Errors:
 *     ChainLogError, StorageError, InvalidFieldError, ChainStateError, InvalidConfigError
 */

// Core
export { ChainLog } from "./chain-log.js";
export type { ChainLogOptions } from "./chain-log.js";
export { CommitQueue } from "./commit-queue.js";
export { verifyLog } from "./verifier.js";
export { commit, isHash, ZERO_HASH } from "./chain.js";
export {
  decodeRecord,
  encodeRecord,
  FIELD_DELIMITER,
  isBlankLine,
  LOG_HEADER,
  LogRecordSchema,
} from "./codec.js";
export type { DecodeResult } from "./codec.js";

// Log storage
export { MemoryLogStore } from "./storage/memory.js";
export { FileLogStore } from "./storage/file.js";
export type { LogStore } from "./storage/interface.js";

// Trust anchor storage
export { MemoryAnchorStore } from "./anchor/memory.js";
export { FileAnchorStore } from "./anchor/file.js";
export { RedisAnchorStore } from "./anchor/redis.js";
export type { RedisAnchorStoreConfig, RedisClientLike } from "./anchor/redis.js";
export type { AnchorStore } from "./anchor/interface.js";
export { AnchorStateSchema, GENESIS_ANCHOR } from "./anchor/state.js";

// Events
export {
  ChainLogEventEmitter,
  EVENT_ANCHOR_RECOVERED,
  EVENT_APPENDED,
  EVENT_RESET,
  EVENT_VERIFIED,
} from "./events.js";
export type {
  ChainAnchorRecoveredEventPayload,
  ChainAppendedEventPayload,
  ChainLogEventListener,
  ChainLogEventName,
  ChainLogEventPayloadMap,
  ChainResetEventPayload,
  ChainVerifiedEventPayload,
} from "./events.js";

// Errors
export {
  ChainLogError,
  ChainStateError,
  InvalidConfigError,
  InvalidFieldError,
  StorageError,
} from "./errors.js";
export type { ChainStateCode } from "./errors.js";

// Config
export {
  createFileChainLog,
  FileChainLogConfigSchema,
  parseFileChainLogConfig,
} from "./config.js";
export type { FileChainLogConfig } from "./config.js";

// Types
export type {
  AnchorState,
  Hash,
  InitializeOutcome,
  InspectedRow,
  LogRecord,
  Reading,
  TamperReason,
  VerificationResult,
} from "./types.js";
