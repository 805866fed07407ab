// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { LogStore } from "@sensorchain/chain-log";
import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { ChainAttacks, RECORD_FIELDS } from "./attacks.js";
import { formatTimestamp } from "./sensor.js";

const PositionSchema = z.number().int().positive();

const ReadingSchema = z.object({
  timestamp: z.string().optional(),
  value: z.string(),
});

export const EditBodySchema = z.object({
  position: PositionSchema,
  field: z.enum(RECORD_FIELDS),
  replacement: z.string(),
});

export const SubstituteBodySchema = z.object({
  position: PositionSchema,
  row: z.string(),
});

export const ForgeBodySchema = z.object({
  readings: z.array(z.object({ timestamp: z.string(), value: z.string() })),
});

export const OverwriteBodySchema = z.object({
  lines: z.array(z.string()),
});

export interface AttackRoutesOptions {
  /** The raw store behind the chain. */
  readonly store: LogStore;
  readonly clock?: () => Date;
}

/**
 * Demonstration routes that corrupt the log on purpose, mounted under
 * `/attacks`. Only registered when attack routes are enabled.
 */
export const attackRoutes: FastifyPluginAsync<AttackRoutesOptions> = async (fastify, options) => {
  const attacks = new ChainAttacks(options.store);
  const clock = options.clock ?? (() => new Date());

  const withTimestamp = (reading: z.infer<typeof ReadingSchema>): { timestamp: string; value: string } => ({
    timestamp: reading.timestamp ?? formatTimestamp(clock()),
    value: reading.value,
  });

  fastify.get("/snapshot", async () => {
    return { lines: await attacks.snapshot() };
  });

  fastify.post("/edit", async (request) => {
    const body = EditBodySchema.parse(request.body);
    const row = await attacks.editField(body.position, body.field, body.replacement);
    request.log.warn({ attack: "edit", position: body.position, field: body.field }, "demonstration attack applied");
    return { attack: "edit", row };
  });

  fastify.post("/substitute", async (request) => {
    const body = SubstituteBodySchema.parse(request.body);
    await attacks.substituteRow(body.position, body.row);
    request.log.warn({ attack: "substitute", position: body.position }, "demonstration attack applied");
    return { attack: "substitute", row: body.row };
  });

  fastify.post("/append-unlinked", async (request) => {
    const reading = withTimestamp(ReadingSchema.parse(request.body));
    const row = await attacks.appendUnlinked(reading);
    request.log.warn({ attack: "append-unlinked" }, "demonstration attack applied");
    return { attack: "append-unlinked", row };
  });

  fastify.post("/append-unhashed", async (request) => {
    const reading = withTimestamp(ReadingSchema.parse(request.body));
    const row = await attacks.appendWithoutHashes(reading);
    request.log.warn({ attack: "append-unhashed" }, "demonstration attack applied");
    return { attack: "append-unhashed", row };
  });

  fastify.post("/forge", async (request) => {
    const body = ForgeBodySchema.parse(request.body);
    const lines = await attacks.forgeChain(body.readings);
    request.log.warn({ attack: "forge", records: body.readings.length }, "demonstration attack applied");
    return { attack: "forge", lines };
  });

  fastify.post("/overwrite", async (request) => {
    const body = OverwriteBodySchema.parse(request.body);
    await attacks.overwrite(body.lines);
    request.log.warn({ attack: "overwrite", lines: body.lines.length }, "demonstration attack applied");
    return { attack: "overwrite", lines: body.lines.length };
  });
};
