// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Fastify plugin that decorates the instance with the chain and the sensor
 * source, and forwards every chain lifecycle event to the Fastify logger.
 *
 * Resets are logged at `warn`: the log file cannot attest to its own
 * erasure, so the process log is where that record lives.
 *
 * ```ts
 * const app = Fastify({ logger: true });
 * await app.register(chainLogFastifyPlugin, { chain, source });
 * app.get("/tip", async () => ({ tip: await app.chainLog.currentTip() }));
 * ```
 */

import {
  EVENT_ANCHOR_RECOVERED,
  EVENT_APPENDED,
  EVENT_RESET,
  EVENT_VERIFIED,
  type ChainAnchorRecoveredEventPayload,
  type ChainAppendedEventPayload,
  type ChainLog,
  type ChainResetEventPayload,
  type ChainVerifiedEventPayload,
} from "@sensorchain/chain-log";
import type { FastifyPluginCallback } from "fastify";
import fp from "fastify-plugin";
import type { SensorSource } from "./sensor.js";

declare module "fastify" {
  interface FastifyInstance {
    chainLog: ChainLog;
    sensorSource: SensorSource;
  }
}

export interface ChainLogPluginOptions {
  readonly chain: ChainLog;
  readonly source: SensorSource;
}

const chainLogPlugin: FastifyPluginCallback<ChainLogPluginOptions> = (fastify, options, done) => {
  fastify.decorate("chainLog", options.chain);
  fastify.decorate("sensorSource", options.source);

  const log = fastify.log;

  const onAppended = ({ record }: ChainAppendedEventPayload): void => {
    log.debug({ timestamp: record.timestamp, value: record.value, entryHash: record.entryHash }, "reading committed");
  };

  const onVerified = ({ result }: ChainVerifiedEventPayload): void => {
    switch (result.status) {
      case "verified":
        log.info({ length: result.length }, "chain verified");
        break;
      case "tampered":
        log.error(
          { position: result.position, reason: result.reason, detail: result.message },
          "chain tampering detected",
        );
        break;
      case "anchor-stale":
        log.warn(
          { length: result.length, tip: result.tip, anchor: result.anchor },
          "trust anchor is one commit behind the log",
        );
        break;
    }
  };

  const onReset = (payload: ChainResetEventPayload): void => {
    log.warn(
      { discardedTip: payload.discardedTip, discardedRecords: payload.discardedRecords, at: payload.timestamp },
      "chain reset: history discarded",
    );
  };

  const onAnchorRecovered = ({ tip }: ChainAnchorRecoveredEventPayload): void => {
    log.warn({ tip }, "trust anchor re-committed to log tip");
  };

  const { events } = options.chain;
  events
    .on(EVENT_APPENDED, onAppended)
    .on(EVENT_VERIFIED, onVerified)
    .on(EVENT_RESET, onReset)
    .on(EVENT_ANCHOR_RECOVERED, onAnchorRecovered);

  fastify.addHook("onClose", (_instance, hookDone) => {
    events
      .off(EVENT_APPENDED, onAppended)
      .off(EVENT_VERIFIED, onVerified)
      .off(EVENT_RESET, onReset)
      .off(EVENT_ANCHOR_RECOVERED, onAnchorRecovered);
    hookDone();
  });

  done();
};

/**
 * The plugin wrapped with `fastify-plugin`, so the decorations are visible
 * to sibling plugins registered on the same instance.
 */
export const chainLogFastifyPlugin = fp(chainLogPlugin, {
  fastify: "4.x",
  name: "sensorchain-chain-log",
});
