import { describe, it, expect } from "vitest";
import { calculateActivityEmissions } from "./activity.js";
import { summarizeEmissions } from "./aggregator.js";
import { exportGhgInventory, kgToTonnes, METHODOLOGY_DESCRIPTION } from "./exports.js";
import { SAMPLE_ACTIVITIES } from "./sample.js";

const now = new Date("2025-03-31T12:00:00.000Z");

describe("kgToTonnes", () => {
  it("keeps kilogram precision", () => {
    expect(kgToTonnes(459.99999999999994)).toBe(0.46);
    expect(kgToTonnes(1234.4)).toBe(1.234);
    expect(kgToTonnes(0)).toBe(0);
  });
});

describe("exportGhgInventory", () => {
  it("exports scope totals in tonnes", () => {
    const summary = summarizeEmissions(SAMPLE_ACTIVITIES.map(calculateActivityEmissions));
    const report = exportGhgInventory(summary, {
      period: "2025-Q1",
      organization: "Acme Foods",
      now,
    });

    expect(report.reportingPeriod).toBe("2025-Q1");
    expect(report.organization).toBe("Acme Foods");
    expect(report.unit).toBe("tCO2e");
    expect(report.scope1_tCO2e).toBe(0.55);
    expect(report.scope2_tCO2e).toBe(0.45);
    expect(report.scope3_tCO2e).toBe(0.8);
    expect(report.total_tCO2e).toBe(1.8);
    expect(report.scopeShares_percent).toEqual({ 1: 30.6, 2: 25, 3: 44.4 });
    expect(report.categories[0]).toEqual({
      scope: 2,
      category: "Electricity",
      emissions_tCO2e: 0.45,
    });
    expect(report.methodology).toBe(METHODOLOGY_DESCRIPTION);
    expect(report.generatedAt).toBe("2025-03-31T12:00:00.000Z");
  });

  it("keeps scope figures consistent with the total", () => {
    const report = exportGhgInventory(
      summarizeEmissions([
        { scope: 1, category: "Fleet", amount: 0.4 },
        { scope: 2, category: "Electricity", amount: 0.4 },
        { scope: 3, category: "Travel", amount: 0.4 },
      ]),
      { period: "2025", organization: "Acme Foods", now },
    );
    expect([report.scope1_tCO2e, report.scope2_tCO2e, report.scope3_tCO2e]).toEqual([0, 0, 0]);
    expect(report.total_tCO2e).toBe(0);
  });

  it("sums rounded scope figures into the total", () => {
    const report = exportGhgInventory(
      summarizeEmissions([
        { scope: 1, category: "Fleet", amount: 100.6 },
        { scope: 2, category: "Electricity", amount: 200.6 },
        { scope: 3, category: "Travel", amount: 0.6 },
      ]),
      { period: "2025", organization: "Acme Foods", now },
    );
    expect(report.scope1_tCO2e).toBe(0.101);
    expect(report.scope2_tCO2e).toBe(0.201);
    expect(report.scope3_tCO2e).toBe(0.001);
    expect(report.total_tCO2e).toBe(0.303);
    expect(report.scope1_tCO2e + report.scope2_tCO2e + report.scope3_tCO2e).toBeCloseTo(
      report.total_tCO2e,
      9,
    );
  });

  it("lists no factor sources when every amount was given directly", () => {
    const summary = summarizeEmissions([
      { scope: 1, category: "Fleet", amount: 120 },
      ...SAMPLE_ACTIVITIES.map(calculateActivityEmissions),
    ]);
    const report = exportGhgInventory(summary, { period: "2025", organization: "Acme Foods", now });
    expect(report.emissionFactorSources).toEqual([]);
  });

  it("lists the sources of looked-up factors once each", () => {
    const entries = [
      { scope: 2, activity: "Electricity", quantity: 1000, unit: "kWh" },
      { scope: 1, activity: "Natural Gas", quantity: 10, unit: "m3" },
      { scope: 3, activity: "Hotel Stays", quantity: 2, unit: "room-night" },
    ] as const;
    const summary = summarizeEmissions(entries.map((e) => calculateActivityEmissions(e)));
    const report = exportGhgInventory(summary, { period: "2025", organization: "Acme Foods", now });
    expect(report.emissionFactorSources).toEqual([
      "US EPA GHG Emission Factors Hub",
      "UK DESNZ GHG conversion factors",
    ]);
  });

  it("reports null shares for an empty inventory", () => {
    const report = exportGhgInventory(summarizeEmissions([]), {
      period: "2025",
      organization: "Acme Foods",
      now,
    });
    expect(report.total_tCO2e).toBe(0);
    expect(report.scopeShares_percent).toBeNull();
    expect(report.categories).toEqual([]);
  });
});
