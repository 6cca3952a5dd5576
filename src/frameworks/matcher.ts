/**
 * Framework matching over the static catalog.
 */

import { IncompleteProfileError } from "../errors.js";
import { FRAMEWORK_CATALOG } from "./catalog.js";
import {
  REVENUE_BANDS,
  type FrameworkId,
  type FrameworkMatch,
  type OrganizationProfile,
  type ProfileInput,
  type RevenueBand,
} from "./types.js";

function isRevenueBand(value: unknown): value is RevenueBand {
  return REVENUE_BANDS.some((b) => b === value);
}

function requireString(input: ProfileInput, field: "sector" | "jurisdiction"): string {
  const value = input[field];
  if (value === undefined || value === null) throw new IncompleteProfileError(field);
  if (typeof value !== "string") throw new IncompleteProfileError(field, "invalid");
  return value;
}

/**
 * Validate untrusted input, checking fields in declaration order.
 * Absent (undefined/null) fields are missing; an empty string is a valid
 * "unspecified" value.
 */
export function toOrganizationProfile(input: ProfileInput): OrganizationProfile {
  const sector = requireString(input, "sector");

  const band = input.annualRevenueBand;
  if (band === undefined || band === null) throw new IncompleteProfileError("annualRevenueBand");
  if (!isRevenueBand(band)) throw new IncompleteProfileError("annualRevenueBand", "invalid");

  const listed = input.isPubliclyTraded;
  if (listed === undefined || listed === null) throw new IncompleteProfileError("isPubliclyTraded");
  if (typeof listed !== "boolean") throw new IncompleteProfileError("isPubliclyTraded", "invalid");

  const jurisdiction = requireString(input, "jurisdiction");

  return { sector, annualRevenueBand: band, isPubliclyTraded: listed, jurisdiction };
}

/**
 * Frameworks whose applicability rule holds for the profile, in catalog order.
 * An empty list is a normal outcome for small private organizations.
 */
export function explainFrameworks(input: ProfileInput): FrameworkMatch[] {
  const profile = toOrganizationProfile(input);
  return FRAMEWORK_CATALOG.filter((rule) => rule.predicate(profile)).map((rule) => ({
    frameworkId: rule.frameworkId,
    name: rule.name,
    rationale: rule.rationale,
  }));
}

export function matchFrameworks(input: ProfileInput): FrameworkId[] {
  return explainFrameworks(input).map((m) => m.frameworkId);
}
