import { InputType } from '../models/decision.js';

/** Keyword rules, checked in order; the first rule with a hit wins */
const INPUT_TYPE_RULES: ReadonlyArray<{ type: InputType; keywords: readonly string[] }> = [
  { type: InputType.DataAnalysis, keywords: ['trend', 'analysis', 'logs'] },
  { type: InputType.Feedback, keywords: ['survey', 'comment', 'complaint'] },
];

/**
 * Classify the evidence behind a decision from its free-text inputs.
 *
 * Case-insensitive substring match, no tokenization; text without any
 * keyword is an Observation.
 */
export function classifyInputType(inputsUsed: string): InputType {
  const text = inputsUsed.toLowerCase();
  for (const rule of INPUT_TYPE_RULES) {
    if (rule.keywords.some((keyword) => text.includes(keyword))) {
      return rule.type;
    }
  }
  return InputType.Observation;
}
