/**
 * Summary metrics and outcome breakdowns over a set of decisions.
 */

import {
  EFFECTIVENESS_VALUES,
  Effectiveness,
  type DecisionRecord,
  type EffectivenessBreakdown,
  type SummaryMetrics,
} from '../models/decision.js';
import { InvalidRecordError } from './errors.js';
import { timeToOutcome } from './time-to-outcome.js';

/** Arithmetic mean; 0 for an empty list */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function summaryMetrics(records: readonly DecisionRecord[]): SummaryMetrics {
  const totalCount = records.length;
  const durations = records.map(timeToOutcome);
  const effectiveCount = records.filter((r) => r.effectiveness === Effectiveness.Effective).length;

  return {
    totalCount,
    avgTimeToOutcome: mean(durations),
    effectiveRatePercent: totalCount === 0 ? 0 : Math.round((100 * effectiveCount) / totalCount),
    repeatableWinCount: records.filter((r) => r.repeatableWin).length,
  };
}

/** STAR (high-impact) decisions, in input order */
export function starDecisions(records: readonly DecisionRecord[]): DecisionRecord[] {
  return records.filter((r) => r.starDecision);
}

/**
 * Count of decisions per effectiveness value. Every value is present,
 * so chart category axes stay stable.
 */
export function effectivenessBreakdown(records: readonly DecisionRecord[]): EffectivenessBreakdown {
  const counts: EffectivenessBreakdown = {
    [Effectiveness.Effective]: 0,
    [Effectiveness.SomewhatEffective]: 0,
    [Effectiveness.NotEffective]: 0,
  };

  for (const record of records) {
    if (!EFFECTIVENESS_VALUES.includes(record.effectiveness)) {
      throw new InvalidRecordError({
        recordId: record.id,
        issues: [`effectiveness: unknown value "${String(record.effectiveness)}"`],
      });
    }
    counts[record.effectiveness]++;
  }

  return counts;
}
