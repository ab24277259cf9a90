import { CONFLICT_SEVERITIES } from './types.js';
import type { ConflictSeverity, SemanticConflict, SemanticDebtReport } from './types.js';

const SECTION_TITLES: Record<ConflictSeverity, string> = {
  critical: 'Critical Conflicts',
  warning: 'Warnings',
  info: 'Info',
};

function conflictLines(conflict: SemanticConflict): string[] {
  const lines = [
    `### ${conflict.name}`,
    '',
    `**Type:** ${conflict.conflict_type}`,
    '',
    `**Description:** ${conflict.description}`,
    '',
    '**Sources:**',
    '',
  ];
  for (const [source, detail] of Object.entries(conflict.details)) {
    lines.push(`- \`${source}\`: ${detail}`);
  }
  lines.push('');
  if (conflict.recommendation) {
    lines.push(`**Recommendation:** ${conflict.recommendation}`, '');
  }
  return lines;
}

export function renderDebtMarkdown(report: SemanticDebtReport): string {
  const { summary } = report;
  const lines = [
    '# Semantic Debt Analysis Report',
    '',
    '## Summary',
    '',
    `- **Models analyzed:** ${report.models_analyzed.length}`,
    `- **Total conflicts:** ${summary.total_conflicts}`,
    `  - Critical: ${summary.critical}`,
    `  - Warning: ${summary.warning}`,
    `  - Info: ${summary.info}`,
    '',
  ];

  const byType = Object.entries(summary.by_type);
  if (byType.length > 0) {
    lines.push('### Conflicts by Type', '');
    for (const [kind, count] of byType) {
      lines.push(`- ${kind}: ${count}`);
    }
    lines.push('');
  }

  for (const severity of CONFLICT_SEVERITIES) {
    const conflicts = report.conflicts.filter((c) => c.severity === severity);
    if (conflicts.length === 0) continue;
    lines.push(`## ${SECTION_TITLES[severity]}`, '');
    for (const conflict of conflicts) {
      lines.push(...conflictLines(conflict));
    }
  }

  if (report.recommendations.length > 0) {
    lines.push('## Recommendations', '');
    report.recommendations.forEach((rec, i) => lines.push(`${i + 1}. ${rec}`));
    lines.push('');
  }

  return lines.join('\n');
}
