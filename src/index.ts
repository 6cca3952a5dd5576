/**
 * scopeledger: GHG emissions bookkeeping.
 *
 * The core (summarizeEmissions, matchFrameworks) is pure and synchronous;
 * loaders and the advisory client are the adapters around it.
 */

export * from "./errors.js";
export * from "./emissions/index.js";
export * from "./frameworks/index.js";
export * from "./loaders/index.js";
export * from "./advisory/index.js";
export {
  DEFAULT_CONFIG,
  getConfigPath,
  loadConfig,
  resolveApiKey,
  resolveConfig,
  type MassUnit,
  type ResolvedConfig,
} from "./config/config.js";
export { ScopeLedgerConfigSchema, type ScopeLedgerConfig } from "./config/zod-schema.js";
export { createSubsystemLogger, setLogLevel, type LogLevel } from "./logging/subsystem.js";
export { buildProgram, runCli } from "./cli/program.js";
