/**
 * Activity-based emission calculation and display helpers.
 */

import { UnknownActivityError } from "../errors.js";
import { findEmissionFactor } from "./factors.js";
import type { ActivityRecord, CarbonEquivalents, EmissionEntry } from "./types.js";

/**
 * Convert an activity record to an entry: quantity × emission factor.
 * An explicit emissionFactor wins over the built-in table.
 */
export function calculateActivityEmissions(record: ActivityRecord): EmissionEntry {
  if (record.emissionFactor !== undefined) {
    return {
      scope: record.scope,
      category: record.activity,
      amount: record.quantity * record.emissionFactor,
    };
  }
  const factor = findEmissionFactor(record.activity);
  if (!factor) {
    throw new UnknownActivityError(record.activity);
  }
  return {
    scope: record.scope,
    category: record.activity,
    amount: record.quantity * factor.kgCo2ePerUnit,
    factorSource: factor.source,
  };
}

/**
 * Calculate relatable equivalents for a CO₂e mass in kg.
 */
export function calculateEquivalents(kgCo2e: number): CarbonEquivalents {
  return {
    // 1 km driving = ~0.12 kg CO2
    carKm: kgCo2e / 0.12,
    // 1 phone charge = ~0.01 kg CO2
    phoneCharges: Math.round(kgCo2e / 0.01),
    // 1 tree absorbs ~0.048 kg CO2 per day
    treeDays: kgCo2e / 0.048,
  };
}

export function formatMass(kg: number, unit: "auto" | "kg" | "t" = "auto"): string {
  if (unit === "t" || (unit === "auto" && kg >= 1000)) {
    return `${(kg / 1000).toFixed(2)} t`;
  }
  return `${kg.toFixed(2)} kg`;
}

export function formatShare(share: number | null): string {
  return share === null ? "n/a" : `${(share * 100).toFixed(1)}%`;
}
