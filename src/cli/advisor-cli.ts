/**
 * `advisor` subcommands: sustainability questions and emissions analysis.
 */

import type { Command } from "commander";
import type { AdvisoryContext, LLMProvider } from "../advisory/types.js";
import { resolveApiKey, type ResolvedConfig } from "../config/config.js";
import { summarizeEmissions } from "../emissions/aggregator.js";
import { explainFrameworks, toOrganizationProfile } from "../frameworks/matcher.js";
import { JsonEntryLoader } from "../loaders/json-loader.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { theme } from "../terminal/theme.js";
import { loadCliConfig } from "./context.js";
import { profileFromFlags, withProfileOptions, type ProfileFlags } from "./frameworks-cli.js";

const log = createSubsystemLogger("cli").child("advisor");

async function createProvider(config: ResolvedConfig, offline: boolean): Promise<LLMProvider> {
  const apiKey = resolveApiKey();
  if (offline || !apiKey) {
    if (!offline) log.warn("OPENAI_API_KEY is not set; using the offline advisor");
    const { createOfflineProvider } = await import("../advisory/offline-provider.js");
    return createOfflineProvider();
  }
  const { createOpenAIProvider } = await import("../advisory/openai-provider.js");
  return createOpenAIProvider({
    apiKey,
    baseUrl: config.advisor.baseUrl,
    defaultModel: config.advisor.model,
  });
}

async function createAdvisor(config: ResolvedConfig, offline: boolean) {
  const { createAdvisoryClient } = await import("../advisory/client.js");
  return createAdvisoryClient({
    provider: await createProvider(config, offline),
    model: config.advisor.model,
    maxTokens: config.advisor.maxTokens,
    temperature: config.advisor.temperature,
    timeoutMs: config.advisor.timeoutMs,
  });
}

function hasProfileFlags(flags: ProfileFlags): boolean {
  return (
    flags.sector !== undefined ||
    flags.revenueBand !== undefined ||
    flags.listed !== undefined ||
    flags.jurisdiction !== undefined
  );
}

export function registerAdvisorCli(program: Command) {
  const advisor = program.command("advisor").description("Sustainability advisory assistant");

  withProfileOptions(
    advisor
      .command("ask")
      .description("Ask a sustainability question")
      .argument("<question...>", "Question text")
      .option("--entries <file>", "Entry file to include as emissions context")
      .option("--offline", "Use canned answers instead of the API"),
  ).action(
    async (
      words: string[],
      opts: ProfileFlags & { entries?: string; offline?: boolean },
      command: Command,
    ) => {
      const config = await loadCliConfig(command);
      const context: AdvisoryContext = { organization: config.report.organization };

      if (opts.entries) {
        context.summary = summarizeEmissions(await new JsonEntryLoader().load(opts.entries));
      }
      if (hasProfileFlags(opts)) {
        context.profile = toOrganizationProfile(profileFromFlags(opts));
        context.frameworks = explainFrameworks(context.profile).map((m) => m.frameworkId);
      }

      const client = await createAdvisor(config, opts.offline ?? false);
      console.log(await client.ask(words.join(" "), context));
    },
  );

  advisor
    .command("analyze")
    .description("Ask for insights and reduction recommendations on an entry file")
    .argument("<file>", "JSON file of emission entries or activity rows")
    .option("--offline", "Use canned answers instead of the API")
    .action(async (file: string, opts: { offline?: boolean }, command: Command) => {
      const config = await loadCliConfig(command);
      const summary = summarizeEmissions(await new JsonEntryLoader().load(file));
      const client = await createAdvisor(config, opts.offline ?? false);
      const analysis = await client.analyzeEmissions(summary);

      const sections: Array<[string, string[]]> = [
        ["Insights", analysis.insights],
        ["Recommendations", analysis.recommendations],
        ["Data Quality", analysis.dataQuality],
      ];
      for (const [title, items] of sections) {
        if (items.length === 0) continue;
        console.log(theme.heading(title));
        for (const item of items) console.log(`  - ${item}`);
        console.log("");
      }
    });
}
