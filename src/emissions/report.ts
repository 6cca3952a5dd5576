/**
 * Terminal rendering for an emissions summary.
 */

import { renderTable, type TableColumn } from "../terminal/table.js";
import { theme } from "../terminal/theme.js";
import { calculateEquivalents, formatMass, formatShare } from "./activity.js";
import { dominantScope } from "./aggregator.js";
import { SCOPES, type EmissionsSummary, type Scope } from "./types.js";

export const SCOPE_LABELS: Record<Scope, string> = {
  1: "Direct emissions",
  2: "Purchased energy",
  3: "Value chain",
};

export type RenderSummaryOpts = {
  massUnit?: "auto" | "kg" | "t";
  title?: string;
};

export function renderEmissionsSummary(
  summary: EmissionsSummary,
  opts: RenderSummaryOpts = {},
): string {
  const unit = opts.massUnit ?? "auto";
  const lines: string[] = [];

  const countLabel = `${summary.entryCount} ${summary.entryCount === 1 ? "entry" : "entries"}`;
  lines.push(
    theme.heading(opts.title ?? "Emissions Summary") + "  " + theme.muted(`[${countLabel}]`),
  );
  lines.push("");

  if (summary.entryCount === 0) {
    lines.push(theme.muted("No emission entries recorded. Scope shares are undefined."));
    return lines.join("\n");
  }

  const largest = dominantScope(summary);
  const largestPart = largest === null ? "" : `    Largest source: Scope ${largest}`;
  lines.push(`  Total: ${theme.accent(formatMass(summary.grandTotal, unit))} CO₂e${largestPart}`);
  lines.push("");

  const scopeCols: TableColumn[] = [
    { key: "scope", header: "Scope" },
    { key: "label", header: "Description" },
    { key: "amount", header: "CO₂e", align: "right", minWidth: 10 },
    { key: "share", header: "Share", align: "right", minWidth: 6 },
  ];
  const scopeRows = SCOPES.map((scope) => ({
    scope: `Scope ${scope}`,
    label: SCOPE_LABELS[scope],
    amount: formatMass(summary.totalByScope[scope], unit),
    share: formatShare(summary.percentByScope?.[scope] ?? null),
  }));
  lines.push(theme.heading("By Scope"));
  lines.push(renderTable({ columns: scopeCols, rows: scopeRows }));

  if (summary.byCategory.length > 0) {
    const categoryCols: TableColumn[] = [
      { key: "category", header: "Category" },
      { key: "scope", header: "Scope", align: "right" },
      { key: "amount", header: "CO₂e", align: "right", minWidth: 10 },
      { key: "share", header: "Share", align: "right", minWidth: 6 },
    ];
    const categoryRows = summary.byCategory.map((c) => ({
      category: c.category,
      scope: String(c.scope),
      amount: formatMass(c.amount, unit),
      share: formatShare(c.share),
    }));
    lines.push("");
    lines.push(theme.heading("By Category"));
    lines.push(renderTable({ columns: categoryCols, rows: categoryRows }));
  }

  if (summary.grandTotal > 0) {
    const equiv = calculateEquivalents(summary.grandTotal);
    lines.push("");
    lines.push(
      theme.muted(
        `  ≈ Driving ${equiv.carKm.toFixed(0)} km  |  ≈ ${equiv.phoneCharges} phone charges  |  ≈ ${equiv.treeDays.toFixed(0)} tree-days`,
      ),
    );
  }

  return lines.join("\n");
}
