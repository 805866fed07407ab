// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { FileChainLogConfigSchema, InvalidConfigError } from "@sensorchain/chain-log";
import { z } from "zod";

/**
 * Zod schema for the server process.
 *
 * Environment values arrive as strings, so numbers and booleans are coerced.
 */
export const ServerConfigSchema = z
  .object({
    logPath: z.string().min(1),
    anchorPath: z.string().min(1),
    host: z.string().min(1).default("127.0.0.1"),
    port: z.coerce.number().int().min(0).max(65_535).default(8080),
    /** Sampling period in milliseconds; 0 disables the sampler. */
    sampleIntervalMs: z.coerce.number().int().nonnegative().default(5_000),
    /**
     * Registers the `/attacks/*` routes that deliberately corrupt the log.
     * Never enable outside a demonstration.
     */
    enableAttackRoutes: z
      .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
      .transform((flag) => flag === true || flag === "true" || flag === "1")
      .default(false),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  })
  .superRefine((config, context) => {
    const paths = FileChainLogConfigSchema.safeParse({
      logPath: config.logPath,
      anchorPath: config.anchorPath,
    });
    if (!paths.success) {
      for (const issue of paths.error.issues) {
        context.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
      }
    }
  });

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Parse and validate a raw config object, throwing InvalidConfigError on
 * failure.
 */
export function parseServerConfig(raw: unknown): ServerConfig {
  const result = ServerConfigSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new InvalidConfigError(messages);
  }
  return result.data;
}

/**
 * Read `SENSORCHAIN_*` variables into a validated config.
 *
 * | Variable                         | Field              |
 * |----------------------------------|--------------------|
 * | SENSORCHAIN_LOG_PATH             | logPath            |
 * | SENSORCHAIN_ANCHOR_PATH          | anchorPath         |
 * | SENSORCHAIN_HOST                 | host               |
 * | SENSORCHAIN_PORT                 | port               |
 * | SENSORCHAIN_SAMPLE_INTERVAL_MS   | sampleIntervalMs   |
 * | SENSORCHAIN_ENABLE_ATTACK_ROUTES | enableAttackRoutes |
 * | SENSORCHAIN_LOG_LEVEL            | logLevel           |
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return parseServerConfig({
    logPath: env["SENSORCHAIN_LOG_PATH"],
    anchorPath: env["SENSORCHAIN_ANCHOR_PATH"],
    host: env["SENSORCHAIN_HOST"],
    port: env["SENSORCHAIN_PORT"],
    sampleIntervalMs: env["SENSORCHAIN_SAMPLE_INTERVAL_MS"],
    enableAttackRoutes: env["SENSORCHAIN_ENABLE_ATTACK_ROUTES"],
    logLevel: env["SENSORCHAIN_LOG_LEVEL"],
  });
}
