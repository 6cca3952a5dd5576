/**
 * ESG readiness self-assessment: ten questions across the E, S and G pillars,
 * each answered by picking one of four options weighted 3/2/1/0.
 */

import { IncompleteAssessmentError } from "../errors.js";

export type EsgPillar = "environmental" | "social" | "governance";

export const ESG_PILLARS: readonly EsgPillar[] = ["environmental", "social", "governance"];

export type ReadinessQuestion = {
  id: string;
  pillar: EsgPillar;
  question: string;
  /** Strongest answer first */
  options: readonly [string, string, string, string];
};

export type MaturityLevel = "Beginning" | "Developing" | "Established" | "Advanced";

export type ReadinessScore = {
  /** Percent (0-100, rounded) per pillar */
  byPillar: Record<EsgPillar, number>;
  /** Percent over all questions, not the mean of the pillar percentages */
  total: number;
  maturity: MaturityLevel;
};

/** Question id → option index (0 = strongest) or the option text. */
export type ReadinessAnswers = Record<string, number | string>;

const OPTION_WEIGHTS = [3, 2, 1, 0] as const;

export const READINESS_QUESTIONS: readonly ReadinessQuestion[] = [
  {
    id: "env_1",
    pillar: "environmental",
    question: "Does your organization have a formal environmental policy?",
    options: ["Comprehensive and regularly reviewed", "Limited in scope", "In development", "No"],
  },
  {
    id: "env_2",
    pillar: "environmental",
    question: "Does your organization track its Scope 1, 2 and 3 emissions?",
    options: ["All scopes", "Scope 1 and 2 only", "Basic tracking only", "No tracking"],
  },
  {
    id: "env_3",
    pillar: "environmental",
    question: "Has your organization set carbon reduction targets?",
    options: ["Science-based targets", "Other formal targets", "Informal targets only", "No targets"],
  },
  {
    id: "env_4",
    pillar: "environmental",
    question: "Does your organization run waste management and recycling programs?",
    options: ["Comprehensive with metrics", "Basic program", "Limited initiatives", "No program"],
  },
  {
    id: "soc_1",
    pillar: "social",
    question: "Does your organization have diversity and inclusion policies?",
    options: ["With targets and metrics", "Written policies", "Informal practices only", "No policies"],
  },
  {
    id: "soc_2",
    pillar: "social",
    question: "Does your organization assess employee satisfaction?",
    options: ["Regular surveys with action plans", "Occasional surveys", "Informal feedback only", "No assessment"],
  },
  {
    id: "soc_3",
    pillar: "social",
    question: "Does your supplier code of conduct include ESG criteria?",
    options: ["Yes, with verification", "Basic requirements", "In development", "No"],
  },
  {
    id: "gov_1",
    pillar: "governance",
    question: "Does the board oversee ESG issues?",
    options: ["Dedicated committee", "Part of an existing committee", "Ad-hoc oversight", "No oversight"],
  },
  {
    id: "gov_2",
    pillar: "governance",
    question: "Does your organization have a formal ESG reporting process?",
    options: ["Follows recognized standards", "Not standardized", "Ad-hoc reporting", "No reporting"],
  },
  {
    id: "gov_3",
    pillar: "governance",
    question: "Does your organization have business ethics and anti-corruption policies?",
    options: ["Comprehensive with training", "Documented policies", "Basic policies only", "No policies"],
  },
];

const RECOMMENDATIONS: Record<EsgPillar, { low: string[]; medium: string[]; high: string[] }> = {
  environmental: {
    low: [
      "Develop a formal environmental policy",
      "Track Scope 1 and 2 emissions",
      "Establish waste management procedures with basic metrics",
    ],
    medium: [
      "Extend emissions tracking to Scope 3",
      "Set formal carbon reduction targets with timelines",
      "Add metrics to the waste management program",
      "Consider ISO 14001 certification",
    ],
    high: [
      "Adopt science-based reduction targets",
      "Run a climate risk assessment",
      "Invest in renewable energy",
    ],
  },
  social: {
    low: [
      "Write diversity and inclusion policies",
      "Survey employee satisfaction regularly",
      "Create a supplier code of conduct",
    ],
    medium: [
      "Set measurable diversity targets",
      "Add ESG criteria to supplier assessments",
      "Start community engagement initiatives",
    ],
    high: [
      "Measure social impact",
      "Audit suppliers against ESG criteria",
    ],
  },
  governance: {
    low: [
      "Give the board oversight of ESG issues",
      "Set up a formal ESG reporting process",
      "Write ethics and anti-corruption policies",
    ],
    medium: [
      "Create a board-level ESG committee",
      "Report against a recognized ESG framework",
      "Train all employees on ethics",
    ],
    high: [
      "Tie executive compensation to ESG metrics",
      "Seek external ESG ratings",
    ],
  },
};

function answerWeight(question: ReadinessQuestion, answer: number | string | undefined): number {
  if (answer === undefined) {
    throw new IncompleteAssessmentError(question.id, "missing");
  }
  let index: number;
  if (typeof answer === "number") {
    index = answer;
  } else {
    const text = answer.trim().toLowerCase();
    index = question.options.findIndex((o) => o.toLowerCase() === text);
  }
  const weight = Number.isInteger(index) ? OPTION_WEIGHTS[index] : undefined;
  if (weight === undefined) {
    throw new IncompleteAssessmentError(question.id, "invalid");
  }
  return weight;
}

export function maturityLevel(totalPercent: number): MaturityLevel {
  if (totalPercent >= 75) return "Advanced";
  if (totalPercent >= 50) return "Established";
  if (totalPercent >= 25) return "Developing";
  return "Beginning";
}

/**
 * Score a completed questionnaire. Every question must be answered; the
 * first unanswered or unrecognized one (in question order) is reported.
 */
export function scoreReadiness(answers: ReadinessAnswers): ReadinessScore {
  const earned: Record<EsgPillar, number> = { environmental: 0, social: 0, governance: 0 };
  const possible: Record<EsgPillar, number> = { environmental: 0, social: 0, governance: 0 };

  for (const question of READINESS_QUESTIONS) {
    earned[question.pillar] += answerWeight(question, answers[question.id]);
    possible[question.pillar] += OPTION_WEIGHTS[0];
  }

  const percent = (num: number, den: number) => Math.round((num / den) * 100);
  const sum = (r: Record<EsgPillar, number>) => r.environmental + r.social + r.governance;
  const total = percent(sum(earned), sum(possible));

  return {
    byPillar: {
      environmental: percent(earned.environmental, possible.environmental),
      social: percent(earned.social, possible.social),
      governance: percent(earned.governance, possible.governance),
    },
    total,
    maturity: maturityLevel(total),
  };
}

/** Pillar scores below 40 get foundational actions, below 70 intermediate ones. */
export function readinessRecommendations(score: ReadinessScore): Record<EsgPillar, string[]> {
  const pick = (pillar: EsgPillar) => {
    const value = score.byPillar[pillar];
    const tiers = RECOMMENDATIONS[pillar];
    if (value < 40) return tiers.low;
    return value < 70 ? tiers.medium : tiers.high;
  };
  return {
    environmental: pick("environmental"),
    social: pick("social"),
    governance: pick("governance"),
  };
}
