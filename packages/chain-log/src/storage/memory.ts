// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { isBlankLine } from "../codec.js";
import { assertSingleLine, type LogStore } from "./interface.js";

/**
 * Volatile in-memory log backend.
 *
 * Lines are held in a plain array in insertion order. Suitable for tests and
 * short-lived processes; data is lost when the process exits.
 */
export class MemoryLogStore implements LogStore {
  private lines: string[];

  constructor(initial: readonly string[] = []) {
    this.lines = initial.slice();
  }

  async readLines(): Promise<string[]> {
    return this.lines.slice();
  }

  async lastLine(): Promise<string | null> {
    for (let index = this.lines.length - 1; index >= 0; index--) {
      const line = this.lines[index];
      if (line !== undefined && !isBlankLine(line)) {
        return line;
      }
    }
    return null;
  }

  async appendLine(line: string): Promise<void> {
    assertSingleLine(line);
    this.lines.push(line);
  }

  async rewrite(lines: readonly string[]): Promise<void> {
    for (const line of lines) {
      assertSingleLine(line);
    }
    this.lines = lines.slice();
  }
}
