/**
 * Builds the dashboard view model from a decision set and filter criteria.
 */

import {
  EFFECTIVENESS_VALUES,
  type DecisionFilterCriteria,
  type DecisionRecord,
  type OwnerPerformance,
  type SummaryMetrics,
} from '../../core/models/decision.js';
import { EFFECTIVENESS_COLORS, EFFECTIVENESS_LABELS, INPUT_TYPE_LABELS } from '../../core/models/display.js';
import {
  effectivenessBreakdown,
  enrichDecisions,
  filterDecisions,
  filterOptions,
  inputUsageFrequency,
  ownerPerformance,
  starDecisions,
  summaryMetrics,
  timeToImpactPoints,
} from '../../core/decisions/index.js';
import type { ActiveCriteria, DashboardView, EffectivenessBar, MetricTile } from './types.js';

export const DASHBOARD_TITLE = 'Decision Intelligence Dashboard';
export const DASHBOARD_CAPTION = 'Are we making the right decisions, fast enough, with the right inputs?';

export const RECOMMENDATIONS: readonly string[] = [
  'Track STAR decisions and replicate winning patterns',
  'Use "Avg Time to Outcome" to coach team efficiency',
  'Build a library of "Repeatable Wins" from top contributors',
  'Review inputs used in effective decisions and reinforce them with training',
];

export function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function formatMetricTiles(summary: SummaryMetrics): MetricTile[] {
  return [
    { label: 'Total Decisions', value: String(summary.totalCount) },
    { label: 'Avg Time to Outcome', value: `${summary.avgTimeToOutcome.toFixed(1)} days` },
    { label: 'Effective Rate', value: `${summary.effectiveRatePercent}%` },
    { label: 'Repeatable Wins', value: `${summary.repeatableWinCount} ⭐` },
  ];
}

function toActiveCriteria(criteria: DecisionFilterCriteria): ActiveCriteria {
  return {
    owners: [...new Set(criteria.owners ?? [])],
    teams: [...new Set(criteria.teams ?? [])],
    effectiveness: [...new Set(criteria.effectiveness ?? [])],
  };
}

function buildEffectivenessChart(records: readonly DecisionRecord[]): EffectivenessBar[] {
  const counts = effectivenessBreakdown(records);
  return EFFECTIVENESS_VALUES.map((effectiveness) => ({
    effectiveness,
    label: EFFECTIVENESS_LABELS[effectiveness],
    color: EFFECTIVENESS_COLORS[effectiveness],
    count: counts[effectiveness],
  }));
}

function roundOwnerRow(row: OwnerPerformance): OwnerPerformance {
  return {
    ...row,
    percentEffective: roundTo1(row.percentEffective),
    avgTimeToOutcome: roundTo1(row.avgTimeToOutcome),
  };
}

/**
 * Key metrics and filter options describe the whole log; every table and
 * chart below them reflects the filtered subset.
 */
export function buildDashboardView(
  records: readonly DecisionRecord[],
  criteria: DecisionFilterCriteria = {},
): DashboardView {
  const active = toActiveCriteria(criteria);
  const filtered = filterDecisions(records, active);
  const summary = summaryMetrics(records);

  return {
    title: DASHBOARD_TITLE,
    caption: DASHBOARD_CAPTION,
    filterOptions: filterOptions(records),
    criteria: active,
    summary,
    metrics: formatMetricTiles(summary),
    starDecisions: starDecisions(filtered),
    decisions: enrichDecisions(filtered),
    effectivenessChart: buildEffectivenessChart(filtered),
    timeToImpact: timeToImpactPoints(filtered),
    inputUsage: inputUsageFrequency(filtered).map((entry) => ({
      ...entry,
      inputTypeLabel: INPUT_TYPE_LABELS[entry.inputType],
    })),
    ownerPerformance: ownerPerformance(filtered).map(roundOwnerRow),
    recommendations: RECOMMENDATIONS,
  };
}
