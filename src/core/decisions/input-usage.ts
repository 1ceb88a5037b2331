import type { DecisionRecord, InputType, InputUsageEntry } from '../models/decision.js';
import { classifyInputType } from './input-type.js';

interface UsageGroup {
  inputType: InputType;
  inputsUsedText: string;
  count: number;
}

/**
 * How often each exact inputs text was used, with its derived category.
 *
 * Distinct texts never merge, even when they share a category. Sorted by
 * count descending; ties keep first-encountered order.
 */
export function inputUsageFrequency(records: readonly DecisionRecord[]): InputUsageEntry[] {
  // Keyed by text alone: the category is a function of the text.
  const groups = new Map<string, UsageGroup>();

  for (const record of records) {
    const existing = groups.get(record.inputsUsed);
    if (existing) {
      existing.count++;
    } else {
      groups.set(record.inputsUsed, {
        inputType: classifyInputType(record.inputsUsed),
        inputsUsedText: record.inputsUsed,
        count: 1,
      });
    }
  }

  return [...groups.values()]
    .sort((a, b) => b.count - a.count)
    .map((group) => ({ ...group }));
}
