// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { AnchorState } from "../types.js";

/**
 * A durable single-value cell holding the trust anchor.
 *
 * Implementations must keep the cell outside the log's own storage medium:
 * restoring or cloning the log alone must not be able to produce a
 * matching anchor. No chain logic lives here.
 */
export interface AnchorStore {
  /**
   * Return the stored state, or the genesis anchor when nothing was ever set.
   */
  get(): Promise<AnchorState>;

  /**
   * Durably replace the stored state. Once this resolves, every later `get`
   * (including after a restart) observes the new value.
   */
  set(state: AnchorState): Promise<void>;
}
