import { renderTable } from "../terminal/table.js";
import { theme } from "../terminal/theme.js";
import { ESG_PILLARS, readinessRecommendations, type EsgPillar, type ReadinessScore } from "./readiness.js";
import type { FrameworkMatch } from "./types.js";

const PILLAR_LABELS: Record<EsgPillar, string> = {
  environmental: "Environmental",
  social: "Social",
  governance: "Governance",
};

export function renderFrameworkMatches(matches: FrameworkMatch[]): string {
  const lines = [theme.heading("Applicable Reporting Frameworks"), ""];

  if (matches.length === 0) {
    lines.push("No major reporting frameworks are required for this profile.");
    lines.push(
      theme.muted("Voluntary reporting with the GRI Standards or the GHG Protocol is recommended."),
    );
    return lines.join("\n");
  }

  for (const match of matches) {
    lines.push(`  ${theme.accent(match.frameworkId.padEnd(5))} ${match.name}`);
    lines.push(theme.muted(`        ${match.rationale}`));
  }
  return lines.join("\n");
}

export function renderReadiness(score: ReadinessScore): string {
  const lines = [theme.heading("ESG Readiness"), ""];
  lines.push(`  Overall: ${theme.accent(`${score.total}%`)}    Maturity: ${score.maturity}`);
  lines.push("");
  lines.push(
    renderTable({
      columns: [
        { key: "pillar", header: "Pillar" },
        { key: "score", header: "Score", align: "right" },
      ],
      rows: ESG_PILLARS.map((p) => ({ pillar: PILLAR_LABELS[p], score: `${score.byPillar[p]}%` })),
    }),
  );

  const recommendations = readinessRecommendations(score);
  lines.push("");
  lines.push(theme.heading("Recommended Actions"));
  for (const pillar of ESG_PILLARS) {
    lines.push(`  ${PILLAR_LABELS[pillar]}`);
    for (const action of recommendations[pillar]) lines.push(`    - ${action}`);
  }
  return lines.join("\n");
}
