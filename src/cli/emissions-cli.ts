/**
 * `emissions` subcommands: summarize entry files, sample data, factor table.
 */

import { Option, type Command } from "commander";
import { calculateActivityEmissions, formatMass } from "../emissions/activity.js";
import { summarizeEmissions } from "../emissions/aggregator.js";
import { exportGhgInventory } from "../emissions/exports.js";
import { listEmissionFactors } from "../emissions/factors.js";
import { renderEmissionsSummary } from "../emissions/report.js";
import { SAMPLE_ACTIVITIES } from "../emissions/sample.js";
import { parseScope } from "../emissions/scope.js";
import type { MassUnit } from "../config/config.js";
import { JsonEntryLoader } from "../loaders/json-loader.js";
import type { EntryLoader } from "../loaders/types.js";
import { renderTable } from "../terminal/table.js";
import { theme } from "../terminal/theme.js";
import { loadCliConfig, writeJson } from "./context.js";

type SummarizeOpts = {
  format: "text" | "json" | "ghg-protocol";
  period: string;
  unit?: MassUnit;
};

export function registerEmissionsCli(
  program: Command,
  deps: { loader?: EntryLoader } = {},
) {
  const loader = deps.loader ?? new JsonEntryLoader();
  const emissions = program.command("emissions").description("Aggregate GHG emissions by scope");

  emissions
    .command("summarize")
    .description("Summarize an entry file by scope and category")
    .argument("<file>", "JSON file of emission entries or activity rows")
    .addOption(
      new Option("--format <format>", "Output format")
        .choices(["text", "json", "ghg-protocol"])
        .default("text"),
    )
    .option("--period <period>", "Reporting period (e.g., 2025, 2025-Q1)", String(new Date().getFullYear()))
    .addOption(new Option("--unit <unit>", "Mass unit for text output").choices(["auto", "kg", "t"]))
    .action(async (file: string, opts: SummarizeOpts, command: Command) => {
      const config = await loadCliConfig(command);
      const summary = summarizeEmissions(await loader.load(file));

      switch (opts.format) {
        case "json":
          writeJson(summary);
          break;
        case "ghg-protocol":
          writeJson(
            exportGhgInventory(summary, {
              period: opts.period,
              organization: config.report.organization,
            }),
          );
          break;
        default:
          console.log(
            renderEmissionsSummary(summary, { massUnit: opts.unit ?? config.report.massUnit }),
          );
      }
    });

  emissions
    .command("sample")
    .description("Show the calculation for a small sample dataset")
    .option("--json", "Print the summary as JSON")
    .action((opts: { json?: boolean }) => {
      const entries = SAMPLE_ACTIVITIES.map(calculateActivityEmissions);
      const summary = summarizeEmissions(entries);
      if (opts.json) {
        writeJson(summary);
        return;
      }

      const rows = SAMPLE_ACTIVITIES.map((a, i) => ({
        activity: a.activity,
        scope: String(a.scope),
        quantity: `${a.quantity} ${a.unit}`,
        factor: String(a.emissionFactor ?? ""),
        co2e: formatMass(entries[i].amount, "kg"),
      }));
      console.log(theme.heading("Sample Activity Data"));
      console.log(
        renderTable({
          columns: [
            { key: "activity", header: "Activity" },
            { key: "scope", header: "Scope", align: "right" },
            { key: "quantity", header: "Quantity", align: "right" },
            { key: "factor", header: "Factor", align: "right" },
            { key: "co2e", header: "CO₂e", align: "right" },
          ],
          rows,
        }),
      );
      console.log("");
      console.log(renderEmissionsSummary(summary));
    });

  emissions
    .command("factors")
    .description("Show built-in emission factors (kg CO₂e per unit)")
    .option("--scope <scope>", "Only factors for one scope (1, 2 or 3)")
    .action((opts: { scope?: string }) => {
      const scope = opts.scope === undefined ? undefined : parseScope(opts.scope);
      const factors = listEmissionFactors(scope);

      console.log(theme.heading("Emission Factors (kg CO₂e per unit)"));
      console.log(
        renderTable({
          columns: [
            { key: "activity", header: "Activity" },
            { key: "scope", header: "Scope", align: "right" },
            { key: "factor", header: "Factor", align: "right" },
            { key: "unit", header: "Unit" },
          ],
          rows: factors.map((f) => ({
            activity: f.activity,
            scope: String(f.scope),
            factor: String(f.kgCo2ePerUnit),
            unit: f.unit,
          })),
        }),
      );
    });
}
