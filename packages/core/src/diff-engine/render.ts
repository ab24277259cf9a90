import { createTwoFilesPatch } from 'diff';
import type { Change, DiffReport } from './types.js';

function entryLines(change: Change): string[] {
  const lines = [`- **${change.element_type}**: \`${change.path}\``];
  if (change.change_type === 'modified' && change.old_value !== null && change.new_value !== null) {
    lines.push(`  - Was: \`${change.old_value}\``);
    lines.push(`  - Now: \`${change.new_value}\``);
  }
  if (change.details) {
    lines.push(`  - ${change.details}`);
  }
  return lines;
}

/**
 * Markdown changelog grouped into Added, Removed and Modified sections.
 */
export function renderChangelog(report: DiffReport): string {
  const { source, target, summary } = report;
  const lines = [
    `# Changelog: ${source.name} → ${target.name}`,
    '',
    `**From**: ${source.name} v${source.version}`,
    `**To**: ${target.name} v${target.version}`,
    '',
    '## Summary',
    '',
    `- Total changes: ${summary.total_changes}`,
    `- Added: ${summary.added}`,
    `- Removed: ${summary.removed}`,
    `- Modified: ${summary.modified}`,
    '',
  ];

  const sections: Array<[string, Change['change_type']]> = [
    ['Added', 'added'],
    ['Removed', 'removed'],
    ['Modified', 'modified'],
  ];

  for (const [title, changeType] of sections) {
    const changes = report.changes.filter((c) => c.change_type === changeType);
    if (changes.length === 0) continue;

    lines.push(`## ${title}`, '');
    for (const change of changes) {
      lines.push(...entryLines(change));
    }
    lines.push('');
  }

  return lines.join('\n');
}

function projectChanges(changes: readonly Change[], side: 'old_value' | 'new_value'): string[] {
  const lines: string[] = [];
  for (const change of changes) {
    const value = change[side];
    if (value !== null) {
      lines.push(`${change.element_type}: ${change.path} = ${value}`);
    }
  }
  return lines.sort();
}

/**
 * Unified-diff view of a report.
 *
 * This is NOT a diff of any serialized model. Each change is projected to one synthetic
 * line ("<element_type>: <path> = <value>"); old values form the "before" text and new
 * values the "after" text, and a line-based LCS diff runs over those two projections.
 * Returns an empty string when there is nothing to show.
 */
export function renderUnifiedDiff(report: DiffReport): string {
  const before = projectChanges(report.changes, 'old_value');
  const after = projectChanges(report.changes, 'new_value');
  if (before.length === 0 && after.length === 0) return '';

  const toText = (lines: string[]) => (lines.length > 0 ? `${lines.join('\n')}\n` : '');

  return createTwoFilesPatch(
    `${report.source.name} v${report.source.version}`,
    `${report.target.name} v${report.target.version}`,
    toText(before),
    toText(after),
  );
}
