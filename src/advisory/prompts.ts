/**
 * Prompt templates for the sustainability advisor.
 */

import { z } from "zod";
import { kgToTonnes } from "../emissions/exports.js";
import type { EmissionsSummary } from "../emissions/types.js";
import type { AdvisoryContext, EmissionsAnalysis } from "./types.js";

export function buildAdvisorSystemPrompt(): string {
  return `You are a sustainability advisor specializing in greenhouse gas accounting, ESG reporting and environmental regulation.

Focus areas:
- GHG emissions calculation methods and standards (GHG Protocol, ISO 14064)
- Emissions reduction strategies
- ESG reporting frameworks (CSRD/ESRS, TCFD, GRI, SASB, CDP)
- Science-based targets and net-zero pathways

Be concise and practical. When organization context is provided, tailor the answer to it and cite the figures you rely on.`;
}

/** Compact, model-friendly view of a summary (tonnes, percentages). */
export function summarizeForPrompt(summary: EmissionsSummary) {
  const shares = summary.percentByScope;
  return {
    total_tCO2e: kgToTonnes(summary.grandTotal),
    scopes: ([1, 2, 3] as const).map((scope) => ({
      scope,
      tCO2e: kgToTonnes(summary.totalByScope[scope]),
      sharePercent: shares ? Math.round(shares[scope] * 1000) / 10 : null,
    })),
    categories: summary.byCategory.map((c) => ({
      scope: c.scope,
      category: c.category,
      tCO2e: kgToTonnes(c.amount),
    })),
  };
}

function contextForPrompt(context: AdvisoryContext): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (context.organization) out.organization = context.organization;
  if (context.profile) out.profile = context.profile;
  if (context.frameworks) out.applicableFrameworks = context.frameworks;
  if (context.summary) out.emissions = summarizeForPrompt(context.summary);
  return out;
}

export function buildAdvisorUserPrompt(query: string, context?: AdvisoryContext): string {
  const parts: string[] = [];
  const ctx = context ? contextForPrompt(context) : {};
  if (Object.keys(ctx).length > 0) {
    parts.push(`Context about the organization: ${JSON.stringify(ctx)}`, "");
  }
  parts.push(`User query: ${query}`);
  return parts.join("\n");
}

export function buildAnalysisSystemPrompt(): string {
  return `You are an emissions analysis expert. Analyze the GHG inventory you are given.

Return ONLY a JSON object with this structure:
{
  "insights": ["key observations about the emissions profile"],
  "recommendations": ["the top 3 actionable reduction measures"],
  "dataQuality": ["areas where better activity data is needed"]
}`;
}

export function buildAnalysisUserPrompt(summary: EmissionsSummary): string {
  return `Please analyze the following emissions inventory:\n\n${JSON.stringify(summarizeForPrompt(summary), null, 2)}`;
}

const AnalysisSchema = z.object({
  insights: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([]),
  dataQuality: z.array(z.string()).default([]),
});

/**
 * Parse the analysis JSON, tolerating a surrounding code fence.
 * Returns null when the response is not a usable analysis object.
 */
export function parseAnalysisResponse(response: string): EmissionsAnalysis | null {
  const trimmed = response.trim();
  const unwrapped = trimmed
    .replace(/^```(?:json)?\s*\n?/, "")
    .replace(/\n?```\s*$/, "")
    .trim();

  let raw: unknown;
  try {
    raw = JSON.parse(unwrapped);
  } catch {
    return null;
  }
  const parsed = AnalysisSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
