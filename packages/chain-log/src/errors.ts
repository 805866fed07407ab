// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Base class for all @sensorchain/chain-log errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages. Verification outcomes
 * are never thrown; these errors cover storage, input and state problems.
 */
export class ChainLogError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChainLogError";
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the log store or the anchor store cannot be read or written.
 *
 * An append or reset that throws this error has not been committed.
 */
export class StorageError extends ChainLogError {
  /** The storage operation that failed, e.g. "append" or "read". */
  readonly operation: string;
  /** Path or key of the affected store. */
  readonly target: string;

  constructor(operation: string, target: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super("STORAGE_FAILURE", `Storage ${operation} failed for "${target}"${detail}`, { cause });
    this.name = "StorageError";
    this.operation = operation;
    this.target = target;
  }
}

/**
 * Thrown at encode time when a field cannot be written into a log row.
 */
export class InvalidFieldError extends ChainLogError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("INVALID_FIELD", `Field "${field}" ${message}`);
    this.name = "InvalidFieldError";
    this.field = field;
  }
}

export type ChainStateCode = "LOG_NOT_INITIALIZED" | "TIP_UNREADABLE" | "ANCHOR_DIVERGED";

/**
 * Thrown when the chain is in a state that must not be extended.
 */
export class ChainStateError extends ChainLogError {
  declare readonly code: ChainStateCode;

  constructor(code: ChainStateCode, message: string) {
    super(code, message);
    this.name = "ChainStateError";
  }
}

/**
 * Thrown when configuration is structurally or semantically invalid.
 *
 * The `details` array carries one entry per validation error, matching the
 * format produced by Zod's `ZodError.issues`.
 */
export class InvalidConfigError extends ChainLogError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super("INVALID_CONFIG", `Configuration is invalid: ${details.join("; ")}`);
    this.name = "InvalidConfigError";
    this.details = details;
  }
}
