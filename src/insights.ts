/**
 * Markdown digest of the key patterns in a run
 */

import { format } from 'date-fns';
import type { DateWindow, InsightsSummary, ValueCount } from './types.js';

const NOTES = [
  'Many latest ATSB aviation entries are ongoing investigations, so final causal findings may not yet be published.',
  'Cause categories in this dashboard are derived from report titles + available narrative text (keyword-based classification).'
];

function formatWindow(window: DateWindow): string {
  if (!window.start || !window.end) return 'n/a';
  return `${format(window.start, 'yyyy-MM-dd')} to ${format(window.end, 'yyyy-MM-dd')}`;
}

function formatTop(counts: ValueCount[]): string {
  const top = counts[0];
  if (!top) return '**none**';
  return `**${top.value}** (${top.count} report${top.count === 1 ? '' : 's'})`;
}

function formatDistribution(counts: ValueCount[]): string[] {
  if (counts.length === 0) return ['- none'];
  return counts.map(({ value, count }) => `- ${value}: ${count}`);
}

export function renderInsights(summary: InsightsSummary): string {
  const lines = [
    `# ATSB aviation reports - key insights (latest ${summary.total})`,
    '',
    `- Reports analysed: **${summary.total}**`,
    `- Date window: **${formatWindow(summary.window)}**`,
    '',
    '## Key patterns',
    `- Most frequent event/cause bucket: ${formatTop(summary.causes)}.`,
    `- Operational context is mainly ${formatTop(summary.operations)}.`,
    `- Severity profile is dominated by ${formatTop(summary.severities)}.`,
    '',
    '## Cause/category distribution',
    ...formatDistribution(summary.causes),
    '',
    '## Severity',
    ...formatDistribution(summary.severities),
    '',
    '## Frequent locations',
    ...formatDistribution(summary.locations),
    '',
    '## Notes',
    ...NOTES.map(note => `- ${note}`)
  ];

  return lines.join('\n');
}
