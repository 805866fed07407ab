// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { ChainLog, LogRecord } from "@sensorchain/chain-log";
import type { SensorSource } from "./sensor.js";

export interface SensorSamplerOptions {
  readonly chain: ChainLog;
  readonly source: SensorSource;
  /** Milliseconds between samples. */
  readonly intervalMs: number;
  /** Receives every failed sample; the sampler keeps running. */
  readonly onError: (error: unknown) => void;
}

/**
 * Periodically reads the sensor and commits the reading to the chain.
 *
 * A tick that fires while the previous sample is still being committed is
 * skipped rather than queued, so a slow disk never builds a backlog.
 */
export class SensorSampler {
  private readonly chain: ChainLog;
  private readonly source: SensorSource;
  private readonly intervalMs: number;
  private readonly onError: (error: unknown) => void;
  private timer: NodeJS.Timeout | undefined;
  private inFlight = false;

  constructor(options: SensorSamplerOptions) {
    if (!Number.isInteger(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`intervalMs must be a positive integer, received ${String(options.intervalMs)}.`);
    }
    this.chain = options.chain;
    this.source = options.source;
    this.intervalMs = options.intervalMs;
    this.onError = options.onError;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Take one reading and append it.
   */
  async sampleOnce(): Promise<LogRecord> {
    const reading = await this.source.read();
    return this.chain.append(reading.timestamp, reading.value);
  }

  start(): void {
    if (this.timer !== undefined) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer === undefined) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  private async tick(): Promise<void> {
    if (this.inFlight) return;
    this.inFlight = true;
    try {
      await this.sampleOnce();
    } catch (error) {
      this.onError(error);
    } finally {
      this.inFlight = false;
    }
  }
}
