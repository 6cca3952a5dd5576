/**
 * Types for ESG framework applicability.
 */

export type RevenueBand = "micro" | "small" | "medium" | "large";

export const REVENUE_BANDS: readonly RevenueBand[] = ["micro", "small", "medium", "large"];

export type OrganizationProfile = {
  /** Free-text industry sector, e.g. "finance", "Financial Services", "energy" */
  sector: string;
  annualRevenueBand: RevenueBand;
  isPubliclyTraded: boolean;
  /** "EU", an EU member state name, or any other country/region; "" when unspecified */
  jurisdiction: string;
};

/** Untrusted profile input as collected from flags or forms. */
export type ProfileInput = {
  [K in keyof OrganizationProfile]?: unknown;
};

export type FrameworkId = "CSRD" | "ESRS" | "SFDR" | "TCFD" | "GRI" | "SASB" | "CDP" | "VSME";

export type FrameworkRule = {
  frameworkId: FrameworkId;
  name: string;
  /** Why the framework applies when the predicate holds */
  rationale: string;
  predicate: (profile: OrganizationProfile) => boolean;
};

export type FrameworkMatch = {
  frameworkId: FrameworkId;
  name: string;
  rationale: string;
};
