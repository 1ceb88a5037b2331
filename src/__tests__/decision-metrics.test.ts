/**
 * Tests for summary metrics, STAR decisions and outcome breakdowns.
 */

import { describe, it, expect } from 'vitest';
import {
  InvalidRecordError,
  effectivenessBreakdown,
  filterDecisions,
  starDecisions,
  summaryMetrics,
} from '../core/decisions/index.js';
import { Effectiveness } from '../core/models/index.js';
import { makeDecision, makeSampleDecisions } from './test-helpers.js';

describe('summaryMetrics', () => {
  it('should summarize the sample log', () => {
    expect(summaryMetrics(makeSampleDecisions())).toEqual({
      totalCount: 5,
      avgTimeToOutcome: 6,
      effectiveRatePercent: 60,
      repeatableWinCount: 3,
    });
  });

  it('should return zeros for an empty set', () => {
    expect(summaryMetrics([])).toEqual({
      totalCount: 0,
      avgTimeToOutcome: 0,
      effectiveRatePercent: 0,
      repeatableWinCount: 0,
    });
  });

  it('should round the effective rate to the nearest whole percent', () => {
    const records = [
      makeDecision({ id: 'A', effectiveness: Effectiveness.Effective }),
      makeDecision({ id: 'B', effectiveness: Effectiveness.Effective }),
      makeDecision({ id: 'C', effectiveness: Effectiveness.NotEffective }),
    ];

    // 200 / 3 = 66.67
    expect(summaryMetrics(records).effectiveRatePercent).toBe(67);
  });

  it('should keep the average time to outcome unrounded', () => {
    const records = [
      makeDecision({ id: 'A', decisionDate: '2025-01-01', outcomeDate: '2025-01-02' }),
      makeDecision({ id: 'B', decisionDate: '2025-01-01', outcomeDate: '2025-01-03' }),
      makeDecision({ id: 'C', decisionDate: '2025-01-01', outcomeDate: '2025-01-03' }),
    ];

    expect(summaryMetrics(records).avgTimeToOutcome).toBeCloseTo(5 / 3, 10);
  });

  it('should equal the summary of an unconstrained filter', () => {
    const records = makeSampleDecisions();

    expect(summaryMetrics(filterDecisions(records, {}))).toEqual(summaryMetrics(records));
  });

  it('should propagate InvalidRecordError from a negative duration', () => {
    const records = [makeDecision({ decisionDate: '2025-02-01', outcomeDate: '2025-01-01' })];

    expect(() => summaryMetrics(records)).toThrow(InvalidRecordError);
  });
});

describe('starDecisions', () => {
  it('should keep STAR decisions in input order', () => {
    expect(starDecisions(makeSampleDecisions()).map((r) => r.id)).toEqual(['D001', 'D004']);
  });

  it('should not infer STAR status from effectiveness', () => {
    const records = makeSampleDecisions();
    const d005 = records.find((r) => r.id === 'D005');

    expect(d005?.effectiveness).toBe(Effectiveness.Effective);
    expect(d005?.repeatableWin).toBe(true);
    expect(starDecisions(records).some((r) => r.id === 'D005')).toBe(false);
  });

  it('should return an empty list for an empty set', () => {
    expect(starDecisions([])).toEqual([]);
  });
});

describe('effectivenessBreakdown', () => {
  it('should count every effectiveness value of the sample log', () => {
    expect(effectivenessBreakdown(makeSampleDecisions())).toEqual({
      Effective: 3,
      SomewhatEffective: 1,
      NotEffective: 1,
    });
  });

  it('should report zero counts for values absent from the data', () => {
    const records = [makeDecision({ id: 'A' }), makeDecision({ id: 'B' })];

    expect(effectivenessBreakdown(records)).toEqual({
      Effective: 2,
      SomewhatEffective: 0,
      NotEffective: 0,
    });
  });

  it('should report all zeros for an empty set', () => {
    expect(effectivenessBreakdown([])).toEqual({
      Effective: 0,
      SomewhatEffective: 0,
      NotEffective: 0,
    });
  });
});
