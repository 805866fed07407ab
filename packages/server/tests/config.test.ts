// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { InvalidConfigError } from "@sensorchain/chain-log";
import { describe, expect, it } from "vitest";
import { loadServerConfig, parseServerConfig } from "../src/config.js";

const PATHS = {
  SENSORCHAIN_LOG_PATH: "/var/lib/sensorchain/readings.csv",
  SENSORCHAIN_ANCHOR_PATH: "/secure/anchor.json",
};

describe("loadServerConfig", () => {
  it("applies defaults for everything but the paths", () => {
    expect(loadServerConfig(PATHS)).toEqual({
      logPath: "/var/lib/sensorchain/readings.csv",
      anchorPath: "/secure/anchor.json",
      host: "127.0.0.1",
      port: 8080,
      sampleIntervalMs: 5_000,
      enableAttackRoutes: false,
      logLevel: "info",
    });
  });

  it("coerces numeric and boolean variables", () => {
    const config = loadServerConfig({
      ...PATHS,
      SENSORCHAIN_PORT: "9000",
      SENSORCHAIN_SAMPLE_INTERVAL_MS: "0",
      SENSORCHAIN_ENABLE_ATTACK_ROUTES: "1",
      SENSORCHAIN_LOG_LEVEL: "debug",
    });
    expect(config.port).toBe(9000);
    expect(config.sampleIntervalMs).toBe(0);
    expect(config.enableAttackRoutes).toBe(true);
    expect(config.logLevel).toBe("debug");
  });

  it("requires the log path", () => {
    expect(() => loadServerConfig({ SENSORCHAIN_ANCHOR_PATH: "/secure/anchor.json" })).toThrow(
      "Configuration is invalid: logPath: Required",
    );
  });
});

describe("parseServerConfig", () => {
  it("rejects an anchor stored at the log path", () => {
    let caught: unknown;
    try {
      parseServerConfig({ logPath: "./readings.csv", anchorPath: "readings.csv" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidConfigError);
    expect(caught).toMatchObject({ details: ["anchorPath: anchorPath must differ from logPath"] });
  });

  it("rejects an unrecognised attack flag", () => {
    expect(() => parseServerConfig({ logPath: "a.csv", anchorPath: "b.json", enableAttackRoutes: "yes" })).toThrow(
      InvalidConfigError,
    );
  });

  it("accepts a boolean attack flag", () => {
    expect(parseServerConfig({ logPath: "a.csv", anchorPath: "b.json", enableAttackRoutes: true }).enableAttackRoutes).toBe(
      true,
    );
  });

  it("rejects a port out of range", () => {
    expect(() => parseServerConfig({ logPath: "a.csv", anchorPath: "b.json", port: 70_000 })).toThrow(InvalidConfigError);
  });
});
