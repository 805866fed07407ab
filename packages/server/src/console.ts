// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import {
  ChainLogError,
  type ChainLog,
  type InspectedRow,
  type VerificationResult,
} from "@sensorchain/chain-log";
import { formatTimestamp, type SensorSource } from "./sensor.js";

export interface ChainConsoleOptions {
  readonly chain: ChainLog;
  readonly source: SensorSource;
  readonly clock?: () => Date;
}

export const CONSOLE_HELP = [
  "commands:",
  "  append <value> [timestamp]  commit a reading (timestamp defaults to now)",
  "  sample                      read the sensor and commit the reading",
  "  verify                      replay the log against the trust anchor",
  "  tip                         print the current tip hash",
  "  show                        list every record",
  "  reset                       discard all history and start from genesis",
  "  recover                     re-commit a stale trust anchor",
  "  help                        show this text",
].join("\n");

/**
 * Operator console. Each input line maps to one chain operation and yields
 * the text to print; the caller owns the terminal.
 */
export class ChainConsole {
  private readonly chain: ChainLog;
  private readonly source: SensorSource;
  private readonly clock: () => Date;

  constructor(options: ChainConsoleOptions) {
    this.chain = options.chain;
    this.source = options.source;
    this.clock = options.clock ?? (() => new Date());
  }

  async execute(line: string): Promise<string> {
    const [command = "", ...args] = line.trim().split(/\s+/);
    try {
      return await this.dispatch(command.toLowerCase(), args);
    } catch (error) {
      if (error instanceof ChainLogError) {
        return `error: ${error.code}: ${error.message}`;
      }
      throw error;
    }
  }

  private async dispatch(command: string, args: readonly string[]): Promise<string> {
    switch (command) {
      case "":
        return "";
      case "help":
        return CONSOLE_HELP;
      case "append": {
        const [value, ...rest] = args;
        if (value === undefined) {
          return "usage: append <value> [timestamp]";
        }
        const timestamp = rest.length > 0 ? rest.join(" ") : formatTimestamp(this.clock());
        const record = await this.chain.append(timestamp, value);
        return `committed ${record.timestamp},${record.value} -> ${record.entryHash}`;
      }
      case "sample": {
        const reading = await this.source.read();
        const record = await this.chain.append(reading.timestamp, reading.value);
        return `committed ${record.timestamp},${record.value} -> ${record.entryHash}`;
      }
      case "verify":
        return describeResult(await this.chain.verify());
      case "tip":
        return await this.chain.currentTip();
      case "show":
        return describeRows(await this.chain.inspect());
      case "reset":
        await this.chain.reset();
        return "chain reset to genesis";
      case "recover":
        return describeResult(await this.chain.recoverAnchor());
      default:
        return `unknown command "${command}"; type help for a list`;
    }
  }
}

/**
 * One-line rendering of a verification outcome.
 */
export function describeResult(result: VerificationResult): string {
  switch (result.status) {
    case "verified":
      return `verified: ${result.length} record(s), chain intact`;
    case "tampered":
      return `TAMPERED at position ${result.position} (${result.reason}): ${result.message}`;
    case "anchor-stale":
      return `anchor stale: log tip ${result.tip} is one commit ahead of anchor ${result.anchor}; run recover`;
  }
}

function describeRows(rows: readonly InspectedRow[]): string {
  if (rows.length === 0) return "(no records)";
  return rows
    .map((row) =>
      row.ok
        ? `${row.position}  ${row.record.timestamp}  ${row.record.value}  ${row.record.entryHash}`
        : `${row.position}  <unreadable: ${row.message}>  ${row.raw}`,
    )
    .join("\n");
}
