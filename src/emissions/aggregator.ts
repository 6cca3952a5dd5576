/**
 * Scope-level aggregation of an emissions snapshot.
 */

import { InvalidAmountError, InvalidScopeError } from "../errors.js";
import { isScope } from "./scope.js";
import type {
  CategoryBreakdown,
  EmissionEntry,
  EmissionsSummary,
  Scope,
  ScopeTotals,
} from "./types.js";

/**
 * Sum entries per scope and overall, then derive each scope's share.
 *
 * Entries are validated before anything is accumulated: an unrecognized
 * scope throws InvalidScopeError, a negative or non-finite amount
 * InvalidAmountError. With a zero grand total (no entries, or
 * only zero amounts) percentByScope and every category share are null.
 */
export function summarizeEmissions(entries: readonly EmissionEntry[]): EmissionsSummary {
  entries.forEach((entry, index) => {
    if (!isScope(entry.scope)) {
      throw new InvalidScopeError(entry.scope, index);
    }
    if (!Number.isFinite(entry.amount) || entry.amount < 0) {
      throw new InvalidAmountError(entry.amount, index);
    }
  });

  const totalByScope: ScopeTotals = { 1: 0, 2: 0, 3: 0 };
  const categories = new Map<string, { scope: Scope; category: string; amount: number }>();
  const sources = new Set<string>();
  let grandTotal = 0;

  for (const entry of entries) {
    totalByScope[entry.scope] += entry.amount;
    grandTotal += entry.amount;
    if (entry.factorSource) sources.add(entry.factorSource);

    const key = `${entry.scope}\u0000${entry.category}`;
    const bucket = categories.get(key);
    if (bucket) {
      bucket.amount += entry.amount;
    } else {
      categories.set(key, { scope: entry.scope, category: entry.category, amount: entry.amount });
    }
  }

  const percentByScope: ScopeTotals | null =
    grandTotal > 0
      ? {
          1: totalByScope[1] / grandTotal,
          2: totalByScope[2] / grandTotal,
          3: totalByScope[3] / grandTotal,
        }
      : null;

  const byCategory: CategoryBreakdown[] = [...categories.values()].map((c) => ({
    ...c,
    share: grandTotal > 0 ? c.amount / grandTotal : null,
  }));

  return {
    totalByScope,
    grandTotal,
    percentByScope,
    entryCount: entries.length,
    byCategory,
    factorSources: [...sources],
  };
}

/**
 * Scope with the largest total, or null for an empty/zero snapshot.
 * Ties resolve to the lower scope number.
 */
export function dominantScope(summary: EmissionsSummary): Scope | null {
  if (summary.grandTotal <= 0) return null;
  const { totalByScope: t } = summary;
  if (t[1] >= t[2] && t[1] >= t[3]) return 1;
  return t[2] >= t[3] ? 2 : 3;
}
