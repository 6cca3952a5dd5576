/**
 * Emissions bookkeeping: scope aggregation, activity factors and reporting.
 *
 * @module emissions
 */

export type {
  ActivityRecord,
  CarbonEquivalents,
  CategoryBreakdown,
  EmissionEntry,
  EmissionFactor,
  EmissionsSummary,
  Scope,
  ScopeTotals,
} from "./types.js";
export { SCOPES } from "./types.js";

export { isScope, parseScope } from "./scope.js";
export { summarizeEmissions, dominantScope } from "./aggregator.js";
export {
  calculateActivityEmissions,
  calculateEquivalents,
  formatMass,
  formatShare,
} from "./activity.js";
export {
  DEFAULT_EMISSION_FACTORS,
  findEmissionFactor,
  listEmissionFactors,
  normalizeActivityKey,
} from "./factors.js";
export { SAMPLE_ACTIVITIES } from "./sample.js";
export { renderEmissionsSummary, SCOPE_LABELS } from "./report.js";
export { exportGhgInventory, kgToTonnes, type GhgInventoryExport } from "./exports.js";
