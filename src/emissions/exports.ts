/**
 * GHG Protocol style inventory export.
 *
 * GHG Protocol Corporate Standard: https://ghgprotocol.org/corporate-standard
 */

import type { EmissionsSummary, Scope } from "./types.js";

export const METHODOLOGY_DESCRIPTION =
  "Activity data multiplied by emission factors (kg CO2e per unit), aggregated per GHG Protocol scope. Scope 2 uses the location-based method.";

export type GhgInventoryExport = {
  reportingPeriod: string;
  organization: string;
  unit: "tCO2e";
  scope1_tCO2e: number;
  scope2_tCO2e: number;
  scope3_tCO2e: number;
  total_tCO2e: number;
  /** Percent of total per scope, null for an empty inventory */
  scopeShares_percent: Record<Scope, number> | null;
  categories: Array<{ scope: Scope; category: string; emissions_tCO2e: number }>;
  methodology: string;
  /** Sources of the factor-table values actually used; explicit factors have none */
  emissionFactorSources: string[];
  generatedAt: string;
};

export type ExportOpts = {
  period: string;
  organization: string;
  now?: Date;
};

/** kg → tonnes, kept to kilogram precision */
export function kgToTonnes(kg: number): number {
  return Math.round(kg) / 1000;
}

function roundPercent(fraction: number): number {
  return Math.round(fraction * 1000) / 10;
}

/**
 * Scope figures are rounded to the kilogram first and the total is their sum,
 * so the exported scopes always add up to the exported total.
 */
export function exportGhgInventory(
  summary: EmissionsSummary,
  opts: ExportOpts,
): GhgInventoryExport {
  const shares = summary.percentByScope;
  const kg = {
    1: Math.round(summary.totalByScope[1]),
    2: Math.round(summary.totalByScope[2]),
    3: Math.round(summary.totalByScope[3]),
  };
  return {
    reportingPeriod: opts.period,
    organization: opts.organization,
    unit: "tCO2e",
    scope1_tCO2e: kg[1] / 1000,
    scope2_tCO2e: kg[2] / 1000,
    scope3_tCO2e: kg[3] / 1000,
    total_tCO2e: (kg[1] + kg[2] + kg[3]) / 1000,
    scopeShares_percent: shares
      ? { 1: roundPercent(shares[1]), 2: roundPercent(shares[2]), 3: roundPercent(shares[3]) }
      : null,
    categories: summary.byCategory.map((c) => ({
      scope: c.scope,
      category: c.category,
      emissions_tCO2e: kgToTonnes(c.amount),
    })),
    methodology: METHODOLOGY_DESCRIPTION,
    emissionFactorSources: summary.factorSources,
    generatedAt: (opts.now ?? new Date()).toISOString(),
  };
}
