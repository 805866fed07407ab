// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import {
  ChainLog,
  ChainStateError,
  MemoryAnchorStore,
  MemoryLogStore,
  type Reading,
} from "@sensorchain/chain-log";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SensorSampler } from "../src/sampler.js";
import type { SensorSource } from "../src/sensor.js";
import { FIRST_HASH, FIRST_READING, makeChain, ScriptedSensorSource, SECOND_READING, THIRD_READING } from "./helpers.js";

/** Source whose reads stay pending until released. */
class StallingSensorSource implements SensorSource {
  reads = 0;
  private release: ((reading: Reading) => void) | undefined;

  read(): Promise<Reading> {
    this.reads++;
    return new Promise((resolve) => {
      this.release = resolve;
    });
  }

  finish(reading: Reading): void {
    this.release?.(reading);
  }
}

describe("SensorSampler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects a non-positive or fractional interval", async () => {
    const { chain } = await makeChain();
    const source = new ScriptedSensorSource([FIRST_READING]);
    expect(() => new SensorSampler({ chain, source, intervalMs: 0, onError: () => undefined })).toThrow(RangeError);
    expect(() => new SensorSampler({ chain, source, intervalMs: 2.5, onError: () => undefined })).toThrow(RangeError);
  });

  it("commits one reading per interval until stopped", async () => {
    const { chain, log } = await makeChain();
    const source = new ScriptedSensorSource([FIRST_READING, SECOND_READING, THIRD_READING]);
    const sampler = new SensorSampler({ chain, source, intervalMs: 1_000, onError: () => undefined });

    sampler.start();
    expect(sampler.running).toBe(true);
    await vi.advanceTimersByTimeAsync(3_000);
    sampler.stop();
    expect(sampler.running).toBe(false);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(source.reads).toBe(3);
    expect(await log.readLines()).toHaveLength(4);
    await expect(chain.verify()).resolves.toEqual({ status: "verified", length: 3 });
  });

  it("samples on demand", async () => {
    const { chain } = await makeChain();
    const sampler = new SensorSampler({
      chain,
      source: new ScriptedSensorSource([FIRST_READING]),
      intervalMs: 1_000,
      onError: () => undefined,
    });
    await expect(sampler.sampleOnce()).resolves.toMatchObject({ entryHash: FIRST_HASH });
  });

  it("skips ticks while a sample is still in flight", async () => {
    const { chain, log } = await makeChain();
    const source = new StallingSensorSource();
    const sampler = new SensorSampler({ chain, source, intervalMs: 1_000, onError: () => undefined });

    sampler.start();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(source.reads).toBe(1);

    source.finish(FIRST_READING);
    await vi.advanceTimersByTimeAsync(0);
    expect(await log.readLines()).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(source.reads).toBe(2);
    sampler.stop();
  });

  it("hands failures to onError and keeps running", async () => {
    const chain = new ChainLog({ log: new MemoryLogStore(), anchor: new MemoryAnchorStore() });
    const errors: unknown[] = [];
    const sampler = new SensorSampler({
      chain,
      source: new ScriptedSensorSource([FIRST_READING]),
      intervalMs: 1_000,
      onError: (error) => errors.push(error),
    });

    sampler.start();
    await vi.advanceTimersByTimeAsync(2_000);
    sampler.stop();

    expect(errors).toHaveLength(2);
    expect(errors[0]).toBeInstanceOf(ChainStateError);
  });
});
