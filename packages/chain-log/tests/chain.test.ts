// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from "vitest";
import { commit, isHash, ZERO_HASH } from "../src/chain.js";

describe("commit", () => {
  it("hashes prevHash, timestamp and value into a known SHA-256 digest", () => {
    expect(commit(ZERO_HASH, "2024-01-01 00:00:00", "20.0")).toBe(
      "092faa84fe641a3ec591846a5d2cbc31e970d4c5ef74f42ebb9fdf792a66d679",
    );
  });

  it("chains from a previous entry hash", () => {
    const first = commit(ZERO_HASH, "2024-01-01 00:00:00", "20.0");
    expect(commit(first, "2024-01-01 00:00:05", "20.5")).toBe(
      "09e9a8121526326cebd1a8a6914010e81d0fd3b1b45247ffea960ff4e1be830c",
    );
  });

  it("is deterministic", () => {
    expect(commit(ZERO_HASH, "t", "1")).toBe(commit(ZERO_HASH, "t", "1"));
  });

  it("separates timestamp and value so shifting the comma changes the hash", () => {
    expect(commit(ZERO_HASH, "2024-01-01 00:00:0", "020.0")).not.toBe(
      commit(ZERO_HASH, "2024-01-01 00:00:00", "20.0"),
    );
  });

  it("produces a well-formed hash", () => {
    expect(isHash(commit(ZERO_HASH, "t", "v"))).toBe(true);
  });
});

describe("ZERO_HASH", () => {
  it("has the same shape as a real digest", () => {
    expect(ZERO_HASH).toHaveLength(64);
    expect(isHash(ZERO_HASH)).toBe(true);
  });
});

describe("isHash", () => {
  it("rejects upper-case hex", () => {
    expect(isHash("A".repeat(64))).toBe(false);
  });

  it("rejects the wrong length", () => {
    expect(isHash("0".repeat(68))).toBe(false);
    expect(isHash("0".repeat(63))).toBe(false);
  });
});
