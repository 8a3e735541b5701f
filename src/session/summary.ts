/**
 * Summary rendering for the end of a session
 */

export const SUMMARY_TITLE = 'perf';

const RULE_WIDTH = 60;

/**
 * A titled section holding one line per executed experiment, or an empty
 * string when nothing ran.
 */
export function renderSummary(lines: readonly string[], title: string = SUMMARY_TITLE): string {
  if (lines.length === 0) return '';
  const label = ` ${title} `;
  const left = Math.max(0, Math.floor((RULE_WIDTH - label.length) / 2));
  const right = Math.max(0, RULE_WIDTH - label.length - left);
  return [`${'='.repeat(left)}${label}${'='.repeat(right)}`, ...lines].join('\n');
}
