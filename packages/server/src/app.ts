// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import {
  ChainLogError,
  ChainStateError,
  InvalidFieldError,
  StorageError,
  type ChainLog,
  type LogStore,
} from "@sensorchain/chain-log";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { ZodError } from "zod";
import { attackRoutes } from "./attack-routes.js";
import { chainLogFastifyPlugin } from "./plugin.js";
import { chainRoutes } from "./routes.js";
import type { SensorSource } from "./sensor.js";

export interface BuildAppOptions {
  readonly chain: ChainLog;
  /** Raw store behind `chain`; only the attack routes touch it. */
  readonly store: LogStore;
  readonly source: SensorSource;
  readonly enableAttackRoutes?: boolean;
  /** Passed to Fastify as is. Defaults to `false`. */
  readonly logger?: FastifyServerOptions["logger"];
  readonly clock?: () => Date;
}

interface ErrorBody {
  readonly error: string;
  readonly message: string;
}

/**
 * Assemble the HTTP surface. The instance is returned ready to `listen` or
 * to `inject` in tests.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false });

  app.setErrorHandler<Error>((error, request, reply) => {
    const { status, body } = describeError(error);
    if (status >= 500) {
      request.log.error({ err: error }, body.message);
    } else {
      request.log.info({ code: body.error }, body.message);
    }
    return reply.status(status).send(body);
  });

  await app.register(chainLogFastifyPlugin, { chain: options.chain, source: options.source });
  await app.register(chainRoutes, { clock: options.clock });

  if (options.enableAttackRoutes === true) {
    await app.register(attackRoutes, { prefix: "/attacks", store: options.store, clock: options.clock });
    app.log.warn("attack routes enabled: /attacks/* can corrupt the log");
  }

  return app;
}

/**
 * Map a thrown error onto an HTTP status and a JSON body.
 */
export function describeError(error: Error): { status: number; body: ErrorBody } {
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return { status: 400, body: { error: "INVALID_REQUEST", message } };
  }
  if (error instanceof InvalidFieldError) {
    return { status: 400, body: { error: error.code, message: error.message } };
  }
  if (error instanceof RangeError) {
    return { status: 400, body: { error: "OUT_OF_RANGE", message: error.message } };
  }
  if (error instanceof ChainStateError) {
    return { status: 409, body: { error: error.code, message: error.message } };
  }
  if (error instanceof StorageError) {
    return { status: 503, body: { error: error.code, message: error.message } };
  }
  if (error instanceof ChainLogError) {
    return { status: 500, body: { error: error.code, message: error.message } };
  }

  const status =
    "statusCode" in error && typeof error.statusCode === "number" && error.statusCode >= 400
      ? error.statusCode
      : 500;
  const code = "code" in error && typeof error.code === "string" ? error.code : "INTERNAL_ERROR";
  return { status, body: { error: code, message: error.message } };
}
