// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { readFile } from "node:fs/promises";
import { StorageError } from "../errors.js";
import { isMissingFile, writeAtomically } from "../storage/file.js";
import type { AnchorState } from "../types.js";
import type { AnchorStore } from "./interface.js";
import { decodeAnchorState, encodeAnchorState, GENESIS_ANCHOR } from "./state.js";

/**
 * Anchor cell kept in its own small JSON file.
 *
 * Every `set` goes through a temp file, fsync and rename, so a crash leaves
 * either the previous or the new state on disk. Point `filePath` at a
 * different volume than the log for the anchor to be worth anything.
 */
export class FileAnchorStore implements AnchorStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async get(): Promise<AnchorState> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return GENESIS_ANCHOR;
      }
      throw new StorageError("read", this.filePath, error);
    }

    const state = decodeAnchorState(raw);
    if (state === null) {
      throw new StorageError("decode", this.filePath);
    }
    return state;
  }

  async set(state: AnchorState): Promise<void> {
    try {
      await writeAtomically(this.filePath, encodeAnchorState(state) + "\n");
    } catch (error) {
      throw new StorageError("write", this.filePath, error);
    }
  }
}
