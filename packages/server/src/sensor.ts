// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { Reading } from "@sensorchain/chain-log";

/**
 * Anything that can produce a timestamped reading on demand: a real sensor
 * driver, a file replay, or the simulator below.
 */
export interface SensorSource {
  read(): Promise<Reading>;
}

export interface SimulatedSensorOptions {
  /** Starting value. Defaults to 20. */
  readonly initial?: number;
  /** Largest change between two consecutive readings. Defaults to 0.5. */
  readonly maxStep?: number;
  /** Inclusive bounds the walk never leaves. Defaults to [-40, 85]. */
  readonly min?: number;
  readonly max?: number;
  /** Uniform random source in [0, 1). Defaults to Math.random. */
  readonly random?: () => number;
  /** Wall clock. Defaults to the current time. */
  readonly now?: () => Date;
}

/**
 * Temperature-like bounded random walk with one decimal of precision.
 */
export class SimulatedSensorSource implements SensorSource {
  private current: number;
  private readonly maxStep: number;
  private readonly min: number;
  private readonly max: number;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(options: SimulatedSensorOptions = {}) {
    this.current = options.initial ?? 20;
    this.maxStep = options.maxStep ?? 0.5;
    this.min = options.min ?? -40;
    this.max = options.max ?? 85;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  async read(): Promise<Reading> {
    const step = (this.random() * 2 - 1) * this.maxStep;
    this.current = Math.min(this.max, Math.max(this.min, this.current + step));
    return {
      timestamp: formatTimestamp(this.now()),
      value: this.current.toFixed(1),
    };
  }
}

/**
 * Render a date as `YYYY-MM-DD HH:mm:ss` in UTC.
 */
export function formatTimestamp(date: Date): string {
  const pad = (part: number): string => String(part).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}
