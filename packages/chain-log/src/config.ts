// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { resolve } from "node:path";
import { z } from "zod";
import { FileAnchorStore } from "./anchor/file.js";
import { ChainLog } from "./chain-log.js";
import { InvalidConfigError } from "./errors.js";
import type { ChainLogEventEmitter } from "./events.js";
import { FileLogStore } from "./storage/file.js";

/**
 * Zod schema for a file-backed chain.
 *
 * The anchor must not share a path with the log: an anchor stored inside the
 * log's own file is rewritten by whoever rewrites the log.
 */
export const FileChainLogConfigSchema = z
  .object({
    /** Path of the plain-text log. */
    logPath: z.string().min(1),
    /** Path of the anchor cell, ideally on a different volume. */
    anchorPath: z.string().min(1),
  })
  .refine((config) => resolve(config.logPath) !== resolve(config.anchorPath), {
    message: "anchorPath must differ from logPath",
    path: ["anchorPath"],
  });

export type FileChainLogConfig = z.infer<typeof FileChainLogConfigSchema>;

/**
 * Parse and validate a raw config object, throwing InvalidConfigError on
 * failure.
 */
export function parseFileChainLogConfig(raw: unknown): FileChainLogConfig {
  const result = FileChainLogConfigSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new InvalidConfigError(messages);
  }
  return result.data;
}

/**
 * Build a ChainLog over a log file and an anchor file.
 */
export function createFileChainLog(raw: unknown, events?: ChainLogEventEmitter): ChainLog {
  const config = parseFileChainLogConfig(raw);
  return new ChainLog({
    log: new FileLogStore(config.logPath),
    anchor: new FileAnchorStore(config.anchorPath),
    events,
  });
}
