import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { stripVTControlCharacters } from "node:util";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "./program.js";

let tmpDir: string;

function captureOutput() {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  return {
    lines: () =>
      log.mock.calls
        .map((args) => stripVTControlCharacters(args.map(String).join(" ")))
        .join("\n")
        .split("\n"),
    stdout: () => write.mock.calls.map(([chunk]) => String(chunk)).join(""),
    stderr: () => error.mock.calls.map((args) => stripVTControlCharacters(args.map(String).join(" "))),
  };
}

function writeEntries(name: string, content: unknown): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, JSON.stringify(content));
  return file;
}

const run = (...args: string[]) => runCli(["node", "scopeledger", ...args]);

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "scopeledger-cli-test-"));
  vi.stubEnv("SCOPELEDGER_CONFIG", path.join(tmpDir, "no-config.json"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("emissions summarize", () => {
  const entries = [
    { scope: 1, category: "Fleet", amount: 100 },
    { scope: 2, category: "Electricity", amount: 50 },
    { scope: "Scope 3", category: "Travel", amount: 50 },
  ];

  it("prints the summary as JSON", async () => {
    const out = captureOutput();
    const file = writeEntries("entries.json", entries);

    expect(await run("emissions", "summarize", file, "--format", "json")).toBe(0);

    const summary = JSON.parse(out.stdout());
    expect(summary.totalByScope).toEqual({ 1: 100, 2: 50, 3: 50 });
    expect(summary.grandTotal).toBe(200);
    expect(summary.percentByScope).toEqual({ 1: 0.5, 2: 0.25, 3: 0.25 });
  });

  it("renders a text report", async () => {
    const out = captureOutput();
    const file = writeEntries("entries.json", entries);

    expect(await run("emissions", "summarize", file)).toBe(0);

    const lines = out.lines();
    expect(lines[0]).toBe("Emissions Summary  [3 entries]");
    expect(lines[2]).toBe("  Total: 200.00 kg CO₂e    Largest source: Scope 1");
  });

  it("honours --unit", async () => {
    const out = captureOutput();
    const file = writeEntries("entries.json", entries);

    await run("emissions", "summarize", file, "--unit", "t");

    expect(out.lines()[2]).toBe("  Total: 0.20 t CO₂e    Largest source: Scope 1");
  });

  it("exports a GHG inventory", async () => {
    const out = captureOutput();
    const file = writeEntries("entries.json", entries);

    await run("emissions", "summarize", file, "--format", "ghg-protocol", "--period", "2024");

    const report = JSON.parse(out.stdout());
    expect(report.reportingPeriod).toBe("2024");
    expect(report.organization).toBe("Reporting organization");
    expect(report.total_tCO2e).toBe(0.2);
  });

  it("takes the organization from the config file", async () => {
    const out = captureOutput();
    const configFile = path.join(tmpDir, "config.json");
    fs.writeFileSync(configFile, JSON.stringify({ report: { organization: "Acme Foods" } }));
    const file = writeEntries("entries.json", entries);

    await run("--config", configFile, "emissions", "summarize", file, "--format", "ghg-protocol");

    expect(JSON.parse(out.stdout()).organization).toBe("Acme Foods");
  });

  it("prints InvalidScopeError verbatim and exits with 1", async () => {
    const out = captureOutput();
    const file = writeEntries("bad.json", [{ scope: 5, category: "x", amount: 1 }]);

    expect(await run("emissions", "summarize", file)).toBe(1);
    expect(out.stderr()).toEqual(["Invalid scope 5 at entry 0: expected 1, 2 or 3"]);
  });

  it("rejects an unknown format", async () => {
    captureOutput();
    const file = writeEntries("entries.json", entries);
    expect(await run("emissions", "summarize", file, "--format", "xml")).toBe(1);
  });
});

describe("emissions sample", () => {
  it("shows the activity calculation and summary", async () => {
    const out = captureOutput();

    expect(await run("emissions", "sample")).toBe(0);

    const lines = out.lines();
    expect(lines[0]).toBe("Sample Activity Data");
    expect(lines).toContain("  Activity      Scope    Quantity  Factor       CO₂e");
    expect(lines).toContain("  Electricity       2    1000 kWh    0.45  450.00 kg");
    expect(lines).toContain("  Vehicle Fuel      1  200 liters     2.3  460.00 kg");
    expect(lines).toContain("  Total: 1.80 t CO₂e    Largest source: Scope 3");
  });

  it("prints JSON with --json", async () => {
    const out = captureOutput();

    await run("emissions", "sample", "--json");

    const summary = JSON.parse(out.stdout());
    expect(summary.entryCount).toBe(5);
    expect(summary.grandTotal).toBeCloseTo(1800, 9);
  });
});

describe("emissions factors", () => {
  it("filters by scope", async () => {
    const out = captureOutput();

    await run("emissions", "factors", "--scope", "2");

    expect(out.lines()).toEqual([
      "Emission Factors (kg CO₂e per unit)",
      "  Activity         Scope  Factor  Unit",
      "  ---------------  -----  ------  ----",
      "  electricity          2   0.416  kWh",
      "  purchased_steam      2    0.09  MJ",
      "  purchased_heat       2    0.07  MJ",
    ]);
  });

  it("rejects an invalid scope", async () => {
    const out = captureOutput();
    expect(await run("emissions", "factors", "--scope", "7")).toBe(1);
    expect(out.stderr()).toEqual(['Invalid scope "7": expected 1, 2 or 3']);
  });
});
