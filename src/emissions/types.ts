/**
 * Core types for emissions bookkeeping. All masses are kg CO₂e.
 */

/** GHG Protocol scope: 1 direct, 2 purchased energy, 3 value chain */
export type Scope = 1 | 2 | 3;

export const SCOPES: readonly Scope[] = [1, 2, 3];

export type EmissionEntry = {
  readonly scope: Scope;
  readonly category: string;
  readonly amount: number;
  /** Factor-table source, set when the amount came from a table lookup */
  readonly factorSource?: string;
};

export type ScopeTotals = Record<Scope, number>;

export type CategoryBreakdown = {
  scope: Scope;
  category: string;
  amount: number;
  /** Fraction of the grand total, null when the grand total is 0 */
  share: number | null;
};

export type EmissionsSummary = {
  totalByScope: ScopeTotals;
  grandTotal: number;
  /** Fractions summing to 1; null when grandTotal is 0 */
  percentByScope: ScopeTotals | null;
  entryCount: number;
  byCategory: CategoryBreakdown[];
  /** Distinct factor-table sources behind the entries, first-seen order */
  factorSources: string[];
};

// -- Activity data --

export type ActivityRecord = {
  scope: Scope;
  activity: string;
  quantity: number;
  unit: string;
  /** kg CO₂e per unit; looked up from the factor table when omitted */
  emissionFactor?: number;
};

export type EmissionFactor = {
  activity: string;
  label: string;
  scope: Scope;
  unit: string;
  /** kg CO₂e per unit */
  kgCo2ePerUnit: number;
  source: string;
};

export type CarbonEquivalents = {
  carKm: number;
  phoneCharges: number;
  treeDays: number;
};
