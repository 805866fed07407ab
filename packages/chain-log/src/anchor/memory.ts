// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { AnchorState } from "../types.js";
import type { AnchorStore } from "./interface.js";
import { GENESIS_ANCHOR } from "./state.js";

/**
 * Volatile anchor cell for tests and short-lived processes.
 */
export class MemoryAnchorStore implements AnchorStore {
  private state: AnchorState;

  constructor(initial: AnchorState = GENESIS_ANCHOR) {
    this.state = initial;
  }

  async get(): Promise<AnchorState> {
    return this.state;
  }

  async set(state: AnchorState): Promise<void> {
    this.state = { committed: state.committed, pending: state.pending };
  }
}
