/**
 * Static framework applicability table.
 *
 * Each rule is evaluated independently; the catalog order is the order in
 * which matches are reported.
 */

import type { FrameworkRule, OrganizationProfile, RevenueBand } from "./types.js";

const SECTOR_ALIASES: Record<string, string> = {
  "financial services": "finance",
  financial: "finance",
  banking: "finance",
  insurance: "finance",
  "asset management": "finance",
  "oil & gas": "oil",
  "oil and gas": "oil",
  "mining & extraction": "mining",
  "transportation & storage": "transportation",
  transport: "transportation",
  logistics: "transportation",
  "agriculture, forestry & fishing": "agriculture",
  "water & waste management": "waste",
  "electric utilities": "utilities",
};

/** Sectors with material physical or transition climate risk. */
const CLIMATE_SENSITIVE_SECTORS = new Set([
  "energy",
  "oil",
  "gas",
  "utilities",
  "mining",
  "manufacturing",
  "transportation",
  "agriculture",
  "waste",
  "finance",
]);

/** Sectors with industry-specific SASB standards for extractives and energy. */
const SASB_SECTORS = new Set(["energy", "oil", "gas", "utilities", "mining"]);

const EU_JURISDICTIONS = new Set([
  "eu",
  "european union",
  "austria",
  "belgium",
  "bulgaria",
  "croatia",
  "cyprus",
  "czech republic",
  "czechia",
  "denmark",
  "estonia",
  "finland",
  "france",
  "germany",
  "greece",
  "hungary",
  "ireland",
  "italy",
  "latvia",
  "lithuania",
  "luxembourg",
  "malta",
  "netherlands",
  "poland",
  "portugal",
  "romania",
  "slovakia",
  "slovenia",
  "spain",
  "sweden",
]);

export function normalizeSector(sector: string): string {
  const key = sector.trim().toLowerCase();
  return SECTOR_ALIASES[key] ?? key;
}

export function isEuJurisdiction(jurisdiction: string): boolean {
  return EU_JURISDICTIONS.has(jurisdiction.trim().toLowerCase());
}

const isBand =
  (...bands: RevenueBand[]) =>
  (p: OrganizationProfile) =>
    bands.includes(p.annualRevenueBand);

const isMediumOrLarge = isBand("medium", "large");

const csrdApplies = (p: OrganizationProfile) =>
  isEuJurisdiction(p.jurisdiction) &&
  (p.annualRevenueBand === "large" || (p.isPubliclyTraded && p.annualRevenueBand !== "micro"));

const rules: FrameworkRule[] = [
  {
    frameworkId: "CSRD",
    name: "Corporate Sustainability Reporting Directive",
    rationale: "Required for large EU undertakings and EU-listed companies other than micro-enterprises",
    predicate: csrdApplies,
  },
  {
    frameworkId: "ESRS",
    name: "European Sustainability Reporting Standards",
    rationale: "The reporting standards used for CSRD disclosures",
    predicate: csrdApplies,
  },
  {
    frameworkId: "SFDR",
    name: "Sustainable Finance Disclosure Regulation",
    rationale: "Applies to EU financial market participants and financial advisers",
    predicate: (p) => isEuJurisdiction(p.jurisdiction) && normalizeSector(p.sector) === "finance",
  },
  {
    frameworkId: "TCFD",
    name: "Task Force on Climate-related Financial Disclosures",
    rationale: "Expected of listed companies and of mid-size or larger firms in climate-sensitive sectors",
    predicate: (p) =>
      p.isPubliclyTraded ||
      (CLIMATE_SENSITIVE_SECTORS.has(normalizeSector(p.sector)) && isMediumOrLarge(p)),
  },
  {
    frameworkId: "GRI",
    name: "Global Reporting Initiative Standards",
    rationale: "Widely expected of large or listed organizations by stakeholders",
    predicate: (p) => p.isPubliclyTraded || p.annualRevenueBand === "large",
  },
  {
    frameworkId: "SASB",
    name: "SASB Standards",
    rationale: "Investor-focused industry standards for listed energy and extractives companies",
    predicate: (p) => p.isPubliclyTraded && SASB_SECTORS.has(normalizeSector(p.sector)),
  },
  {
    frameworkId: "CDP",
    name: "CDP Climate Change Questionnaire",
    rationale: "Investors routinely request CDP disclosure from listed mid-size and large companies",
    predicate: (p) => p.isPubliclyTraded && isMediumOrLarge(p),
  },
  {
    frameworkId: "VSME",
    name: "Voluntary SME Standard",
    rationale: "Voluntary standard for EU SMEs outside CSRD scope",
    predicate: (p) =>
      isEuJurisdiction(p.jurisdiction) &&
      !p.isPubliclyTraded &&
      isBand("micro", "small", "medium")(p),
  },
];

export const FRAMEWORK_CATALOG: readonly FrameworkRule[] = Object.freeze(
  rules.map((rule) => Object.freeze(rule)),
);

export function findFrameworkRule(frameworkId: string): FrameworkRule | null {
  const id = frameworkId.trim().toUpperCase();
  return FRAMEWORK_CATALOG.find((r) => r.frameworkId === id) ?? null;
}
