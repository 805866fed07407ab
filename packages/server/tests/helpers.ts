// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { ChainLog, MemoryAnchorStore, MemoryLogStore, type Reading } from "@sensorchain/chain-log";
import type { SensorSource } from "../src/sensor.js";

export const ZERO = "0".repeat(64);
/** commit(ZERO, "2024-01-01 00:00:00", "20.0") */
export const FIRST_HASH = "092faa84fe641a3ec591846a5d2cbc31e970d4c5ef74f42ebb9fdf792a66d679";
/** commit(FIRST_HASH, "2024-01-01 00:00:05", "20.5") */
export const SECOND_HASH = "09e9a8121526326cebd1a8a6914010e81d0fd3b1b45247ffea960ff4e1be830c";

export const FIRST_READING: Reading = { timestamp: "2024-01-01 00:00:00", value: "20.0" };
export const SECOND_READING: Reading = { timestamp: "2024-01-01 00:00:05", value: "20.5" };
export const THIRD_READING: Reading = { timestamp: "2024-01-01 00:00:10", value: "20.7" };

/** Replays a fixed list of readings, then repeats the last one. */
export class ScriptedSensorSource implements SensorSource {
  reads = 0;
  private readonly readings: readonly Reading[];

  constructor(readings: readonly Reading[]) {
    this.readings = readings;
  }

  async read(): Promise<Reading> {
    const reading = this.readings[Math.min(this.reads, this.readings.length - 1)];
    this.reads++;
    if (reading === undefined) {
      throw new Error("no scripted readings");
    }
    return reading;
  }
}

export async function makeChain(
  readings: readonly Reading[] = [],
): Promise<{ chain: ChainLog; log: MemoryLogStore; anchor: MemoryAnchorStore }> {
  const log = new MemoryLogStore();
  const anchor = new MemoryAnchorStore();
  const chain = new ChainLog({ log, anchor, now: () => "2024-01-01T00:00:00.000Z" });
  await chain.initialize();
  for (const { timestamp, value } of readings) {
    await chain.append(timestamp, value);
  }
  return { chain, log, anchor };
}

/** 2024-01-01 00:00:05 UTC */
export const fixedClock = (): Date => new Date(Date.UTC(2024, 0, 1, 0, 0, 5));
