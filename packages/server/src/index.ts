// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @sensorchain/server: HTTP surface, sampler and operator console for a
 * sensorchain log.
 */

export { buildApp, describeError } from "./app.js";
export type { BuildAppOptions } from "./app.js";
export { chainLogFastifyPlugin } from "./plugin.js";
export type { ChainLogPluginOptions } from "./plugin.js";
export { AppendBodySchema, chainRoutes } from "./routes.js";
export type { ChainRoutesOptions } from "./routes.js";
export {
  attackRoutes,
  EditBodySchema,
  ForgeBodySchema,
  OverwriteBodySchema,
  SubstituteBodySchema,
} from "./attack-routes.js";
export type { AttackRoutesOptions } from "./attack-routes.js";
export { ChainAttacks, locateRecord, RECORD_FIELDS } from "./attacks.js";
export type { RecordField } from "./attacks.js";
export { ChainConsole, CONSOLE_HELP, describeResult } from "./console.js";
export type { ChainConsoleOptions } from "./console.js";
export { loadServerConfig, parseServerConfig, ServerConfigSchema } from "./config.js";
export type { ServerConfig } from "./config.js";
export { SensorSampler } from "./sampler.js";
export type { SensorSamplerOptions } from "./sampler.js";
export { formatTimestamp, SimulatedSensorSource } from "./sensor.js";
export type { SensorSource, SimulatedSensorOptions } from "./sensor.js";
