/**
 * Tests for input usage frequency.
 */

import { describe, it, expect } from 'vitest';
import { inputUsageFrequency } from '../core/decisions/index.js';
import { InputType } from '../core/models/index.js';
import { makeDecision, makeSampleDecisions } from './test-helpers.js';

describe('inputUsageFrequency', () => {
  it('should list each distinct input once for the sample log, in first-seen order', () => {
    expect(inputUsageFrequency(makeSampleDecisions())).toEqual([
      { inputType: InputType.DataAnalysis, inputsUsedText: 'Call volume trend, shift overlap data', count: 1 },
      { inputType: InputType.DataAnalysis, inputsUsedText: 'Referral approval logs', count: 1 },
      { inputType: InputType.Feedback, inputsUsedText: 'Anecdotal staff complaints', count: 1 },
      { inputType: InputType.Feedback, inputsUsedText: 'Patient survey comments', count: 1 },
      { inputType: InputType.DataAnalysis, inputsUsedText: 'Top 10 call reasons analysis', count: 1 },
    ]);
  });

  it('should group identical text across owners and sort by count descending', () => {
    const records = [
      makeDecision({ id: 'A', owner: 'Ana', inputsUsed: 'Queue logs' }),
      makeDecision({ id: 'B', owner: 'Ben', inputsUsed: 'Exit survey' }),
      makeDecision({ id: 'C', owner: 'Cid', inputsUsed: 'Exit survey' }),
      makeDecision({ id: 'D', owner: 'Dee', inputsUsed: 'Exit survey' }),
      makeDecision({ id: 'E', owner: 'Eve', inputsUsed: 'Queue logs' }),
    ];

    expect(inputUsageFrequency(records)).toEqual([
      { inputType: InputType.Feedback, inputsUsedText: 'Exit survey', count: 3 },
      { inputType: InputType.DataAnalysis, inputsUsedText: 'Queue logs', count: 2 },
    ]);
  });

  it('should never merge distinct texts that share an input type', () => {
    const records = [
      makeDecision({ id: 'A', inputsUsed: 'Queue logs' }),
      makeDecision({ id: 'B', inputsUsed: 'queue logs' }),
    ];

    const result = inputUsageFrequency(records);

    expect(result.map((e) => e.inputsUsedText)).toEqual(['Queue logs', 'queue logs']);
    expect(result.every((e) => e.count === 1 && e.inputType === InputType.DataAnalysis)).toBe(true);
  });

  it('should break count ties by first-encountered order', () => {
    const records = [
      makeDecision({ id: 'A', inputsUsed: 'Walkthrough' }),
      makeDecision({ id: 'B', inputsUsed: 'Usage trend' }),
      makeDecision({ id: 'C', inputsUsed: 'Usage trend' }),
      makeDecision({ id: 'D', inputsUsed: 'Walkthrough' }),
      makeDecision({ id: 'E', inputsUsed: 'Board comment' }),
    ];

    expect(inputUsageFrequency(records).map((e) => [e.inputsUsedText, e.count])).toEqual([
      ['Walkthrough', 2],
      ['Usage trend', 2],
      ['Board comment', 1],
    ]);
  });

  it('should return an empty list for an empty set', () => {
    expect(inputUsageFrequency([])).toEqual([]);
  });
});
