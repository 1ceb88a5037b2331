/**
 * Report formatter — renders a DashboardView as plain text.
 */

import { EFFECTIVENESS_LABELS, INPUT_TYPE_LABELS } from '../../core/models/display.js';
import type { DashboardView } from './types.js';

const NONE = '  (none)';

function padRight(str: string, len: number): string {
  if (str.length >= len) return str;
  return str + ' '.repeat(len - str.length);
}

function formatFilters(view: DashboardView): string {
  const parts: string[] = [];
  if (view.criteria.owners.length > 0) parts.push(`Owner: ${view.criteria.owners.join(', ')}`);
  if (view.criteria.teams.length > 0) parts.push(`Team: ${view.criteria.teams.join(', ')}`);
  if (view.criteria.effectiveness.length > 0) {
    parts.push(`Effectiveness: ${view.criteria.effectiveness.map((e) => EFFECTIVENESS_LABELS[e]).join(', ')}`);
  }
  return parts.length > 0 ? parts.join('; ') : '(none)';
}

function formatDecisionRows(view: DashboardView): string[] {
  if (view.decisions.length === 0) return [NONE];
  return view.decisions.map((d) => [
    `  ${padRight(d.id, 6)}`,
    padRight(d.owner, 12),
    padRight(d.team, 12),
    padRight(`${d.timeToOutcomeDays}d`, 4),
    padRight(INPUT_TYPE_LABELS[d.inputType], 18),
    EFFECTIVENESS_LABELS[d.effectiveness],
  ].join('| '));
}

function formatOwnerTable(view: DashboardView): string[] {
  if (view.ownerPerformance.length === 0) return [NONE];
  const header = `  ${padRight('owner', 12)}| ${padRight('decisions', 10)}| ${padRight('% effective', 12)}| avg days`;
  const rows = view.ownerPerformance.map((row) =>
    `  ${padRight(row.owner, 12)}| ${padRight(String(row.decisionsMade), 10)}| ${padRight(row.percentEffective.toFixed(1), 12)}| ${row.avgTimeToOutcome.toFixed(1)}`,
  );
  return [header, ...rows];
}

/**
 * Format a dashboard view into a display string.
 */
export function formatDashboardReport(view: DashboardView): string {
  const lines: string[] = [
    `═══ ${view.title} ═══`,
    view.caption,
    '',
    'Key Metrics:',
    ...view.metrics.map((tile) => `  ${tile.label}: ${tile.value}`),
    '',
    `Filters: ${formatFilters(view)}`,
    '',
    'STAR Decisions (High Impact):',
  ];

  if (view.starDecisions.length === 0) {
    lines.push(NONE);
  } else {
    for (const d of view.starDecisions) {
      lines.push(`  ${d.id} ${d.owner} (${d.team}): ${d.goal} → ${d.result}`);
    }
  }

  lines.push('', `All Decisions Logged (${view.decisions.length}):`, ...formatDecisionRows(view));

  lines.push('', 'Decision Outcomes:');
  for (const bar of view.effectivenessChart) {
    lines.push(`  ${bar.label}: ${bar.count}`);
  }

  lines.push('', 'Inputs Used:');
  if (view.inputUsage.length === 0) {
    lines.push(NONE);
  } else {
    for (const row of view.inputUsage) {
      lines.push(`  ${row.count}x ${row.inputTypeLabel}: ${row.inputsUsedText}`);
    }
  }

  lines.push('', 'Owner Performance:', ...formatOwnerTable(view));

  lines.push('', 'Recommendations:');
  for (const item of view.recommendations) {
    lines.push(`  - ${item}`);
  }

  return lines.join('\n');
}
