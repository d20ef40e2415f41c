import type { RationaleEntry, RiskLabel } from '../schemas/assessment.js';
import type { ScoreResult } from '../scoring/scoreMetrics.js';
import type { EffectiveScoringConfig, ScoreBands } from '../scoring/scoringConfig.js';

export const NO_RISK_FACTORS_SUMMARY = 'no significant risk factors observed';

/** Reasons named in the one-line summary */
const SUMMARY_REASON_LIMIT = 3;

export interface Rationale {
  readonly label: RiskLabel;
  readonly summary: string;
  /** Contributing metrics, largest first */
  readonly entries: readonly RationaleEntry[];
}

export function riskLabel(score: number, bands: ScoreBands): RiskLabel {
  if (score >= bands.high) return 'High';
  if (score >= bands.medium) return 'Medium';
  return 'Low';
}

/**
 * Rank the metrics that moved the score and explain each one.
 *
 * Order is by descending contribution, ties broken by catalog declaration
 * order. Metrics that added nothing are left out.
 */
export function generateRationale(result: ScoreResult, config: EffectiveScoringConfig): Rationale {
  const { catalog } = config;
  const label = riskLabel(result.score, config.bands);

  const ranked = result.contributions
    .filter((c) => c.contribution > 0)
    .sort((a, b) => {
      const diff = Math.abs(b.contribution) - Math.abs(a.contribution);
      if (diff !== 0) return diff;
      return catalog.indexOf(a.name) - catalog.indexOf(b.name);
    });

  const total = ranked.reduce((sum, c) => sum + c.contribution, 0);

  const entries: RationaleEntry[] = ranked.map((c) => {
    const share = total > 0 ? c.contribution / total : 0;
    const reason = catalog.get(c.name)?.reason ?? c.name;
    return Object.freeze({
      metric: c.name,
      contribution: Math.round(c.contribution * 100 * 100) / 100,
      share: Math.round(share * 10_000) / 10_000,
      explanation: `${c.name} contributed ${Math.round(share * 100)}% of the score due to ${reason}`,
    });
  });

  const summary =
    entries.length === 0
      ? NO_RISK_FACTORS_SUMMARY
      : `${label} risk (${result.score}/100): ${ranked
          .slice(0, SUMMARY_REASON_LIMIT)
          .map((c) => catalog.get(c.name)?.reason ?? c.name)
          .join(', ')}`;

  return Object.freeze({ label, summary, entries: Object.freeze(entries) });
}

/**
 * Render a rationale as display lines
 */
export function formatRationale(rationale: Rationale, score: number): string[] {
  const lines = [`Risk score ${score}/100 (${rationale.label})`];
  if (rationale.entries.length === 0) {
    lines.push(`  ${NO_RISK_FACTORS_SUMMARY}`);
    return lines;
  }
  for (const entry of rationale.entries) {
    lines.push(`  - ${entry.explanation} (+${entry.contribution.toFixed(2)})`);
  }
  return lines;
}
