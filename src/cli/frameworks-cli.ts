/**
 * `frameworks` subcommands: match a profile against the catalog.
 */

import type { Command } from "commander";
import { FRAMEWORK_CATALOG } from "../frameworks/catalog.js";
import { explainFrameworks } from "../frameworks/matcher.js";
import { READINESS_QUESTIONS, scoreReadiness } from "../frameworks/readiness.js";
import { renderFrameworkMatches, renderReadiness } from "../frameworks/render.js";
import type { ProfileInput } from "../frameworks/types.js";
import { loadReadinessAnswers } from "../loaders/answers-loader.js";
import { renderTable } from "../terminal/table.js";
import { theme } from "../terminal/theme.js";
import { writeJson } from "./context.js";

export type ProfileFlags = {
  sector?: string;
  revenueBand?: string;
  listed?: boolean;
  jurisdiction?: string;
};

/** Adds the organization profile flags shared by `frameworks match` and `advisor ask`. */
export function withProfileOptions(command: Command): Command {
  return command
    .option("--sector <sector>", "Industry sector (e.g., finance, energy, retail)")
    .option("--revenue-band <band>", "Annual revenue band: micro, small, medium, large")
    .option("--listed", "Publicly traded on a stock exchange")
    .option("--no-listed", "Privately held")
    .option("--jurisdiction <jurisdiction>", 'Jurisdiction, e.g. "EU", "Germany", "US"; "" if unspecified');
}

export function profileFromFlags(flags: ProfileFlags): ProfileInput {
  return {
    sector: flags.sector,
    annualRevenueBand: flags.revenueBand?.trim().toLowerCase(),
    isPubliclyTraded: flags.listed,
    jurisdiction: flags.jurisdiction,
  };
}

export function registerFrameworksCli(program: Command) {
  const frameworks = program
    .command("frameworks")
    .description("Find the ESG reporting frameworks that apply to an organization");

  withProfileOptions(
    frameworks.command("match").description("Match an organization profile against the catalog"),
  )
    .option("--json", "Print matches as JSON")
    .action((opts: ProfileFlags & { json?: boolean }) => {
      const matches = explainFrameworks(profileFromFlags(opts));
      if (opts.json) {
        writeJson({ frameworks: matches.map((m) => m.frameworkId), matches });
        return;
      }
      console.log(renderFrameworkMatches(matches));
    });

  frameworks
    .command("list")
    .description("List every framework in the catalog")
    .action(() => {
      console.log(theme.heading("Framework Catalog"));
      console.log(
        renderTable({
          columns: [
            { key: "id", header: "Id" },
            { key: "name", header: "Name" },
          ],
          rows: FRAMEWORK_CATALOG.map((r) => ({ id: r.frameworkId, name: r.name })),
        }),
      );
    });

  frameworks
    .command("readiness")
    .description("Score an ESG readiness questionnaire")
    .argument("<answers>", "JSON file mapping question ids to an option index (0 = strongest) or option text")
    .option("--json", "Print the score as JSON")
    .action(async (file: string, opts: { json?: boolean }) => {
      const score = scoreReadiness(await loadReadinessAnswers(file));
      if (opts.json) {
        writeJson(score);
        return;
      }
      console.log(renderReadiness(score));
    });

  frameworks
    .command("questions")
    .description("List the readiness questionnaire")
    .action(() => {
      console.log(theme.heading("ESG Readiness Questionnaire"));
      for (const q of READINESS_QUESTIONS) {
        console.log(`  ${theme.accent(q.id)}  ${q.question}`);
        q.options.forEach((option, i) => console.log(theme.muted(`      ${i}. ${option}`)));
      }
    });
}
