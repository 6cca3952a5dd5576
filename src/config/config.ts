/**
 * Configuration loading.
 *
 * Config file: ~/.scopeledger/config.json (override with SCOPELEDGER_CONFIG).
 * The advisor API key is never stored in the file; it comes from OPENAI_API_KEY.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import path from "node:path";
import os from "node:os";
import { ConfigError } from "../errors.js";
import { ScopeLedgerConfigSchema, type ScopeLedgerConfig } from "./zod-schema.js";

export type MassUnit = "auto" | "kg" | "t";

export type ResolvedConfig = {
  advisor: {
    model: string;
    baseUrl: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  report: {
    organization: string;
    massUnit: MassUnit;
  };
  logLevel: "debug" | "info" | "warn" | "error";
};

export const DEFAULT_CONFIG: ResolvedConfig = {
  advisor: {
    model: "gpt-4o",
    baseUrl: "https://api.openai.com/v1",
    maxTokens: 800,
    temperature: 0.3,
    timeoutMs: 30_000,
  },
  report: {
    organization: "Reporting organization",
    massUnit: "auto",
  },
  logLevel: "warn",
};

export function resolveConfig(config?: ScopeLedgerConfig): ResolvedConfig {
  return {
    advisor: { ...DEFAULT_CONFIG.advisor, ...config?.advisor },
    report: { ...DEFAULT_CONFIG.report, ...config?.report },
    logLevel: config?.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.SCOPELEDGER_CONFIG ?? path.join(os.homedir(), ".scopeledger", "config.json");
}

/**
 * Load and validate the config file. A missing file yields the defaults.
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<ResolvedConfig> {
  if (!existsSync(configPath)) {
    return resolveConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, { cause: err });
  }

  const parsed = ScopeLedgerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(`Invalid config ${configPath} at ${where}: ${issue.message}`, {
      cause: parsed.error,
    });
  }
  return resolveConfig(parsed.data);
}

export function resolveApiKey(env: NodeJS.ProcessEnv = process.env): string | null {
  const key = env.OPENAI_API_KEY?.trim();
  return key ? key : null;
}
