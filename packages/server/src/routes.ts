// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { ChainStateError, type Hash } from "@sensorchain/chain-log";
import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { formatTimestamp } from "./sensor.js";

/**
 * Body of `POST /chain/append`. Without a value, the sensor is sampled.
 */
export const AppendBodySchema = z
  .object({
    value: z.string().min(1).optional(),
    timestamp: z.string().min(1).optional(),
  })
  .strict();

export interface ChainRoutesOptions {
  /** Clock used to stamp readings submitted without a timestamp. */
  readonly clock?: () => Date;
}

/**
 * Read-only inspection and the legitimate write operations. Requires
 * `chainLogFastifyPlugin` to be registered first.
 */
export const chainRoutes: FastifyPluginAsync<ChainRoutesOptions> = async (fastify, options) => {
  const clock = options.clock ?? (() => new Date());
  const chain = fastify.chainLog;

  fastify.get("/chain", async () => {
    const [rows, anchor] = await Promise.all([chain.inspect(), chain.anchorState()]);
    let tip: Hash | null;
    try {
      tip = await chain.currentTip();
    } catch (error) {
      // An undecodable tail has no tip; the rows still show what is there.
      if (!(error instanceof ChainStateError)) throw error;
      tip = null;
    }
    return { rows, tip, anchor };
  });

  fastify.get("/chain/tip", async () => {
    return { tip: await chain.currentTip() };
  });

  fastify.get("/chain/verify", async () => {
    return chain.verify();
  });

  fastify.post("/chain/append", async (request, reply) => {
    const body = AppendBodySchema.parse(request.body ?? {});

    let timestamp: string;
    let value: string;
    if (body.value === undefined) {
      const reading = await fastify.sensorSource.read();
      timestamp = body.timestamp ?? reading.timestamp;
      value = reading.value;
    } else {
      timestamp = body.timestamp ?? formatTimestamp(clock());
      value = body.value;
    }

    const record = await chain.append(timestamp, value);
    return reply.status(201).send(record);
  });

  fastify.post("/chain/reset", async () => {
    await chain.reset();
    return { status: "reset" };
  });

  fastify.post("/chain/anchor/recover", async () => {
    return chain.recoverAnchor();
  });
};
