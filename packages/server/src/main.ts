// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Process entry point: file-backed chain, HTTP surface, periodic sampler and,
 * on a terminal, the operator console.
 *
 *   SENSORCHAIN_LOG_PATH=./readings.csv SENSORCHAIN_ANCHOR_PATH=/secure/anchor.json \
 *     sensorchain-server
 */

import { createInterface } from "node:readline";
import { createFileChainLog, FileLogStore } from "@sensorchain/chain-log";
import { buildApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import { ChainConsole } from "./console.js";
import { SensorSampler } from "./sampler.js";
import { SimulatedSensorSource } from "./sensor.js";

async function main(): Promise<void> {
  const config = loadServerConfig();

  const chain = createFileChainLog({ logPath: config.logPath, anchorPath: config.anchorPath });
  const source = new SimulatedSensorSource();
  const app = await buildApp({
    chain,
    store: new FileLogStore(config.logPath),
    source,
    enableAttackRoutes: config.enableAttackRoutes,
    logger: { level: config.logLevel },
  });

  const outcome = await chain.initialize();
  app.log.info({ logPath: config.logPath, anchorPath: config.anchorPath, outcome }, "chain opened");

  await app.listen({ host: config.host, port: config.port });

  const sampler =
    config.sampleIntervalMs > 0
      ? new SensorSampler({
          chain,
          source,
          intervalMs: config.sampleIntervalMs,
          onError: (error) => app.log.error({ err: error }, "sample failed"),
        })
      : undefined;
  sampler?.start();

  const terminal = process.stdin.isTTY
    ? createInterface({ input: process.stdin, output: process.stdout, prompt: "sensorchain> " })
    : undefined;

  let closing = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (closing) return;
    closing = true;
    app.log.info({ signal }, "shutting down");
    sampler?.stop();
    terminal?.close();
    await app.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        app.log.error({ err: error }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }

  if (terminal !== undefined) {
    const operator = new ChainConsole({ chain, source });
    terminal.prompt();
    terminal.on("line", (line) => {
      operator
        .execute(line)
        .then((output) => {
          if (output.length > 0) process.stdout.write(`${output}\n`);
        })
        .catch((error: unknown) => {
          app.log.error({ err: error }, "console command failed");
        })
        .finally(() => {
          if (!closing) terminal.prompt();
        });
    });
    // readline swallows Ctrl-C on a TTY.
    terminal.on("SIGINT", () => terminal.close());
    terminal.on("close", () => {
      shutdown("console closed").catch((error: unknown) => {
        app.log.error({ err: error }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
