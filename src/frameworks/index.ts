/**
 * ESG framework applicability.
 *
 * @module frameworks
 */

export type {
  FrameworkId,
  FrameworkMatch,
  FrameworkRule,
  OrganizationProfile,
  ProfileInput,
  RevenueBand,
} from "./types.js";
export { REVENUE_BANDS } from "./types.js";
export {
  FRAMEWORK_CATALOG,
  findFrameworkRule,
  isEuJurisdiction,
  normalizeSector,
} from "./catalog.js";
export { explainFrameworks, matchFrameworks, toOrganizationProfile } from "./matcher.js";
export { renderFrameworkMatches, renderReadiness } from "./render.js";
export {
  ESG_PILLARS,
  READINESS_QUESTIONS,
  maturityLevel,
  readinessRecommendations,
  scoreReadiness,
  type EsgPillar,
  type MaturityLevel,
  type ReadinessAnswers,
  type ReadinessQuestion,
  type ReadinessScore,
} from "./readiness.js";
