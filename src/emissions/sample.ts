import type { ActivityRecord } from "./types.js";

/** Small demo dataset for `emissions sample`. */
export const SAMPLE_ACTIVITIES: readonly ActivityRecord[] = [
  { scope: 2, activity: "Electricity", quantity: 1000, unit: "kWh", emissionFactor: 0.45 },
  { scope: 1, activity: "Natural Gas", quantity: 500, unit: "kWh", emissionFactor: 0.18 },
  { scope: 1, activity: "Vehicle Fuel", quantity: 200, unit: "liters", emissionFactor: 2.3 },
  { scope: 3, activity: "Air Travel", quantity: 5000, unit: "km", emissionFactor: 0.15 },
  { scope: 3, activity: "Waste", quantity: 100, unit: "kg", emissionFactor: 0.5 },
];
