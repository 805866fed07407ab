// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from "zod";
import { isHash } from "./chain.js";
import { InvalidFieldError } from "./errors.js";
import type { LogRecord } from "./types.js";

/** Header row written at the top of every log. */
export const LOG_HEADER = "datetime,value,prevHash,entryHash";

export const FIELD_DELIMITER = ",";

const FIELD_COUNT = 4;

const FORBIDDEN_CHARACTERS = /[,\r\n]/;

const TextFieldSchema = z
  .string()
  .refine((text) => !FORBIDDEN_CHARACTERS.test(text), {
    message: "must not contain a comma or a line break",
  });

const HashFieldSchema = z.string().refine(isHash, {
  message: "must be 64 lower-case hex characters",
});

/**
 * Zod schema for a record at the codec boundary.
 */
export const LogRecordSchema = z.object({
  timestamp: TextFieldSchema,
  value: TextFieldSchema,
  prevHash: HashFieldSchema,
  entryHash: HashFieldSchema,
});

export type DecodeResult =
  | { readonly ok: true; readonly record: LogRecord }
  | { readonly ok: false; readonly message: string };

/**
 * Lines that are empty after trimming are not records (stray newlines).
 */
export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Serialise a record to its row. Throws InvalidFieldError when a field would
 * corrupt the row structure.
 */
export function encodeRecord(record: LogRecord): string {
  const result = LogRecordSchema.safeParse(record);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue !== undefined ? issue.path.join(".") : "record";
    throw new InvalidFieldError(field, issue?.message ?? "is invalid");
  }
  const { timestamp, value, prevHash, entryHash } = result.data;
  return [timestamp, value, prevHash, entryHash].join(FIELD_DELIMITER);
}

/**
 * Parse one row. A row that does not split into exactly four well-formed
 * fields is reported, not repaired.
 */
export function decodeRecord(row: string): DecodeResult {
  const fields = row.split(FIELD_DELIMITER);
  if (fields.length !== FIELD_COUNT) {
    return {
      ok: false,
      message: `expected ${FIELD_COUNT} fields but found ${fields.length}`,
    };
  }

  const [timestamp, value, prevHash, entryHash] = fields;
  const result = LogRecordSchema.safeParse({ timestamp, value, prevHash, entryHash });
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    return { ok: false, message: messages.join("; ") };
  }
  return { ok: true, record: result.data };
}
