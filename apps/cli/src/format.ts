import type pc from 'picocolors';
import {
  formatRationale,
  type EffectiveScoringConfig,
  type RiskAssessment,
  type RiskLabel,
} from '@droidrisk/risk-engine';

export type Colors = ReturnType<typeof pc.createColors>;

function labelColor(label: RiskLabel, c: Colors): (text: string) => string {
  switch (label) {
    case 'High':
      return c.red;
    case 'Medium':
      return c.yellow;
    case 'Low':
      return c.green;
  }
}

/**
 * Human-readable report for `assess --format text`
 */
export function formatAssessment(assessment: RiskAssessment, c: Colors): string[] {
  const [headline = '', ...factors] = formatRationale(
    { label: assessment.label, summary: assessment.summary, entries: assessment.rationale },
    assessment.score,
  );
  const lines = [c.bold(labelColor(assessment.label, c)(headline)), ...factors, '', assessment.summary];

  const { dynamic } = assessment;
  const eventLine = `Dynamic analysis: ${dynamic.eventCount} event(s)${dynamic.truncated ? ' (truncated)' : ''}`;
  lines.push(c.gray(eventLine));
  if (dynamic.unknownTags.length > 0) {
    lines.push(c.gray(`Unrecognized tags: ${dynamic.unknownTags.join(', ')}`));
  }

  if (assessment.notices.length > 0) {
    lines.push('', c.bold('Notices:'));
    for (const notice of assessment.notices) {
      lines.push(`  ${c.yellow('!')} ${notice.message}`);
    }
  }

  lines.push('', c.gray(`Assessment ${assessment.assessmentId}`));
  return lines;
}

/**
 * One line per catalog metric with its effective weight and cap
 */
export function formatCatalog(config: EffectiveScoringConfig, c: Colors): string[] {
  const lines = [c.bold(`${'METRIC'.padEnd(30)}${'KIND'.padEnd(12)}${'SOURCE'.padEnd(9)}${'WEIGHT'.padEnd(8)}CAP`)];
  for (const spec of config.catalog.specs) {
    const weight = (config.weights.get(spec.name) ?? 0).toFixed(2);
    const cap = config.caps.get(spec.name);
    lines.push(
      `${c.cyan(spec.name.padEnd(30))}${spec.kind.padEnd(12)}${spec.source.padEnd(9)}${weight.padEnd(8)}${cap ?? '-'}`,
    );
  }
  lines.push('', c.gray(`Bands: Medium >= ${config.bands.medium}, High >= ${config.bands.high}`));
  lines.push(c.gray(`Unavailable metrics: ${config.unavailablePolicy}`));
  return lines;
}
