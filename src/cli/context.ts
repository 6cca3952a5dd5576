import type { Command } from "commander";
import { loadConfig, getConfigPath, type ResolvedConfig } from "../config/config.js";
import { setLogLevel } from "../logging/subsystem.js";

/**
 * Load configuration for a command, honouring the global --config option.
 */
export async function loadCliConfig(command: Command): Promise<ResolvedConfig> {
  const { config } = command.optsWithGlobals<{ config?: string }>();
  const resolved = await loadConfig(config ?? getConfigPath());
  setLogLevel(resolved.logLevel);
  return resolved;
}

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + "\n");
}
