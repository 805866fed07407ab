// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { StorageError } from "../errors.js";
import type { AnchorState } from "../types.js";
import type { AnchorStore } from "./interface.js";
import { decodeAnchorState, encodeAnchorState, GENESIS_ANCHOR } from "./state.js";

/**
 * Minimal Redis client interface.
 *
 * This avoids a hard dependency on any specific Redis library. ioredis,
 * node-redis and upstash-redis all expose compatible methods.
 */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<string | null>;
}

export interface RedisAnchorStoreConfig {
  client: RedisClientLike;
  /** Key holding the anchor. Defaults to "sensorchain:anchor". */
  key?: string;
}

/**
 * Anchor cell stored under a single Redis key, typically on a host in a
 * separate trust domain from the device writing the log. Durability follows
 * the server's persistence settings (AOF with `appendfsync always` for
 * crash consistency).
 */
export class RedisAnchorStore implements AnchorStore {
  readonly #client: RedisClientLike;
  readonly #key: string;

  constructor(config: RedisAnchorStoreConfig) {
    this.#client = config.client;
    this.#key = config.key ?? "sensorchain:anchor";
  }

  async get(): Promise<AnchorState> {
    let raw: string | null;
    try {
      raw = await this.#client.get(this.#key);
    } catch (error) {
      throw new StorageError("read", this.#key, error);
    }
    if (raw === null) return GENESIS_ANCHOR;

    const state = decodeAnchorState(raw);
    if (state === null) {
      throw new StorageError("decode", this.#key);
    }
    return state;
  }

  async set(state: AnchorState): Promise<void> {
    try {
      await this.#client.set(this.#key, encodeAnchorState(state));
    } catch (error) {
      throw new StorageError("write", this.#key, error);
    }
  }
}
