// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { randomBytes } from "node:crypto";
import { open, readFile, rename, rm, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { isBlankLine } from "../codec.js";
import { StorageError } from "../errors.js";
import { assertSingleLine, type LogStore } from "./interface.js";

/**
 * Append-only plain-text file backend, one row per line.
 *
 * Appends go through an append-mode handle, writing until every byte of the
 * row is out, then fsync. A short or failed write truncates the file back to
 * its previous length, so an append either lands whole or leaves the tail as
 * it was. `rewrite` writes a sibling temp file and renames it over the log.
 *
 * Reading always parses the entire file from disk so that the in-process
 * view stays consistent with anything written by other processes.
 */
export class FileLogStore implements LogStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async readLines(): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new StorageError("read", this.filePath, error);
    }
    return splitLines(content);
  }

  async lastLine(): Promise<string | null> {
    const lines = await this.readLines();
    for (let index = lines.length - 1; index >= 0; index--) {
      const line = lines[index];
      if (line !== undefined && !isBlankLine(line)) {
        return line;
      }
    }
    return null;
  }

  async appendLine(line: string): Promise<void> {
    assertSingleLine(line);
    try {
      const handle = await open(this.filePath, "a+");
      try {
        const { size } = await handle.stat();
        let prefix = "";
        if (size > 0) {
          // A file edited by hand may lack its final newline; never glue the
          // new row onto the previous one.
          const lastByte = Buffer.alloc(1);
          await handle.read(lastByte, 0, 1, size - 1);
          if (lastByte.toString("utf8") !== "\n") {
            prefix = "\n";
          }
        }

        const data = Buffer.from(prefix + line + "\n", "utf8");
        try {
          let offset = 0;
          while (offset < data.length) {
            const written = await this.writeChunk(handle, data, offset);
            if (written <= 0) {
              throw new Error(`write made no progress after ${offset} of ${data.length} bytes`);
            }
            offset += written;
          }
          await handle.sync();
        } catch (error) {
          // The file must end exactly where the last committed row ended.
          await handle.truncate(size);
          await handle.sync();
          throw error;
        }
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw new StorageError("append", this.filePath, error);
    }
  }

  /**
   * Write `data` from `offset` onwards at the end of the file. Returns the
   * number of bytes the system accepted, which may be fewer than requested.
   */
  protected async writeChunk(handle: FileHandle, data: Buffer, offset: number): Promise<number> {
    const { bytesWritten } = await handle.write(data, offset, data.length - offset);
    return bytesWritten;
  }

  async rewrite(lines: readonly string[]): Promise<void> {
    for (const line of lines) {
      assertSingleLine(line);
    }
    const content = lines.length > 0 ? lines.join("\n") + "\n" : "";
    try {
      await writeAtomically(this.filePath, content);
    } catch (error) {
      throw new StorageError("rewrite", this.filePath, error);
    }
  }
}

/**
 * Write `content` to `filePath` through a temp file, fsync and rename, then
 * fsync the directory, so the target holds either the old or the new content
 * after a crash and a write that resolved survives a power loss.
 */
export async function writeAtomically(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`;
  try {
    const handle = await open(tempPath, "wx");
    try {
      await handle.writeFile(content, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }

  const directory = await open(dirname(filePath), "r");
  try {
    await directory.sync();
  } finally {
    await directory.close();
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}
