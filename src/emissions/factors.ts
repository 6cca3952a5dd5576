/**
 * Default emission factors (kg CO₂e per activity unit).
 *
 * Sources: US EPA GHG Emission Factors Hub (stationary/mobile combustion,
 * eGRID US average), UK DESNZ conversion factors (travel, waste, materials),
 * IPCC AR4 GWP-100 for refrigerant leakage (kg CO₂e per kg leaked).
 * Figures are rounded averages; supply a site-specific emissionFactor where
 * one is available.
 */

import type { EmissionFactor, Scope } from "./types.js";

const EPA = "US EPA GHG Emission Factors Hub";
const DESNZ = "UK DESNZ GHG conversion factors";
const IPCC_AR4 = "IPCC AR4 100-year global warming potentials";

export const DEFAULT_EMISSION_FACTORS: readonly EmissionFactor[] = [
  // Scope 1: stationary and mobile combustion
  {
    activity: "natural_gas",
    label: "Natural gas",
    scope: 1,
    unit: "m3",
    kgCo2ePerUnit: 2.05,
    source: EPA,
  },
  {
    activity: "diesel_stationary",
    label: "Diesel (stationary)",
    scope: 1,
    unit: "L",
    kgCo2ePerUnit: 2.7,
    source: EPA,
  },
  {
    activity: "gasoline",
    label: "Gasoline",
    scope: 1,
    unit: "L",
    kgCo2ePerUnit: 2.33,
    source: EPA,
  },
  {
    activity: "diesel_mobile",
    label: "Diesel (fleet)",
    scope: 1,
    unit: "L",
    kgCo2ePerUnit: 2.67,
    source: EPA,
  },
  // Scope 1: fugitive refrigerant leakage; keys match "R-410A" etc. after normalization
  {
    activity: "r_410a",
    label: "R-410A leakage",
    scope: 1,
    unit: "kg",
    kgCo2ePerUnit: 2088,
    source: IPCC_AR4,
  },
  {
    activity: "r_134a",
    label: "R-134a leakage",
    scope: 1,
    unit: "kg",
    kgCo2ePerUnit: 1430,
    source: IPCC_AR4,
  },
  {
    activity: "r_32",
    label: "R-32 leakage",
    scope: 1,
    unit: "kg",
    kgCo2ePerUnit: 675,
    source: IPCC_AR4,
  },
  {
    activity: "r_404a",
    label: "R-404A leakage",
    scope: 1,
    unit: "kg",
    kgCo2ePerUnit: 3922,
    source: IPCC_AR4,
  },
  // Scope 2: purchased energy
  {
    activity: "electricity",
    label: "Grid electricity",
    scope: 2,
    unit: "kWh",
    kgCo2ePerUnit: 0.416,
    source: EPA,
  },
  {
    activity: "purchased_steam",
    label: "Purchased steam",
    scope: 2,
    unit: "MJ",
    kgCo2ePerUnit: 0.09,
    source: EPA,
  },
  {
    activity: "purchased_heat",
    label: "Purchased heat",
    scope: 2,
    unit: "MJ",
    kgCo2ePerUnit: 0.07,
    source: EPA,
  },
  // Scope 3: business travel, commuting, waste, purchased goods
  {
    activity: "air_travel_short",
    label: "Air travel (short haul)",
    scope: 3,
    unit: "passenger-km",
    kgCo2ePerUnit: 0.156,
    source: DESNZ,
  },
  {
    activity: "air_travel_long",
    label: "Air travel (long haul)",
    scope: 3,
    unit: "passenger-km",
    kgCo2ePerUnit: 0.139,
    source: DESNZ,
  },
  {
    activity: "hotel_stays",
    label: "Hotel stays",
    scope: 3,
    unit: "room-night",
    kgCo2ePerUnit: 21.8,
    source: DESNZ,
  },
  {
    activity: "rental_car",
    label: "Rental car",
    scope: 3,
    unit: "km",
    kgCo2ePerUnit: 0.175,
    source: DESNZ,
  },
  {
    activity: "car_commute",
    label: "Car commuting",
    scope: 3,
    unit: "passenger-km",
    kgCo2ePerUnit: 0.175,
    source: DESNZ,
  },
  {
    activity: "public_transit",
    label: "Public transit",
    scope: 3,
    unit: "passenger-km",
    kgCo2ePerUnit: 0.067,
    source: DESNZ,
  },
  {
    activity: "landfill_waste",
    label: "Landfill waste",
    scope: 3,
    unit: "kg",
    kgCo2ePerUnit: 0.458,
    source: DESNZ,
  },
  {
    activity: "recycled_waste",
    label: "Recycled waste",
    scope: 3,
    unit: "kg",
    kgCo2ePerUnit: 0.021,
    source: DESNZ,
  },
  {
    activity: "paper_consumption",
    label: "Paper",
    scope: 3,
    unit: "kg",
    kgCo2ePerUnit: 1.39,
    source: DESNZ,
  },
  {
    activity: "water_consumption",
    label: "Water supply",
    scope: 3,
    unit: "m3",
    kgCo2ePerUnit: 0.344,
    source: DESNZ,
  },
];

/** Normalize "Natural Gas" / "natural-gas" to "natural_gas". */
export function normalizeActivityKey(activity: string): string {
  return activity
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_");
}

export function findEmissionFactor(activity: string): EmissionFactor | null {
  const key = normalizeActivityKey(activity);
  return DEFAULT_EMISSION_FACTORS.find((f) => f.activity === key) ?? null;
}

export function listEmissionFactors(scope?: Scope): EmissionFactor[] {
  return DEFAULT_EMISSION_FACTORS.filter((f) => scope === undefined || f.scope === scope);
}
