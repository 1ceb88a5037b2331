/**
 * Display labels and chart colours for the decision enums.
 */

import { Effectiveness, InputType } from './decision.js';

export const EFFECTIVENESS_LABELS: Record<Effectiveness, string> = {
  [Effectiveness.Effective]: '✅ Effective',
  [Effectiveness.SomewhatEffective]: '⚠️ Somewhat Effective',
  [Effectiveness.NotEffective]: '❌ Not Effective',
};

export const EFFECTIVENESS_COLORS: Record<Effectiveness, string> = {
  [Effectiveness.Effective]: 'green',
  [Effectiveness.SomewhatEffective]: 'orange',
  [Effectiveness.NotEffective]: 'red',
};

export const INPUT_TYPE_LABELS: Record<InputType, string> = {
  [InputType.DataAnalysis]: '📊 Data Analysis',
  [InputType.Feedback]: '🗣️ Feedback',
  [InputType.Observation]: '🔍 Observation',
};

const EFFECTIVENESS_ALIASES: ReadonlyMap<string, Effectiveness> = new Map([
  ['Effective', Effectiveness.Effective],
  ['SomewhatEffective', Effectiveness.SomewhatEffective],
  ['NotEffective', Effectiveness.NotEffective],
  ['Somewhat Effective', Effectiveness.SomewhatEffective],
  ['Not Effective', Effectiveness.NotEffective],
  [EFFECTIVENESS_LABELS.Effective, Effectiveness.Effective],
  [EFFECTIVENESS_LABELS.SomewhatEffective, Effectiveness.SomewhatEffective],
  [EFFECTIVENESS_LABELS.NotEffective, Effectiveness.NotEffective],
]);

/**
 * Resolve an effectiveness value written either canonically or as its
 * display label. Returns null for anything else.
 */
export function parseEffectiveness(raw: string): Effectiveness | null {
  return EFFECTIVENESS_ALIASES.get(raw.trim()) ?? null;
}
