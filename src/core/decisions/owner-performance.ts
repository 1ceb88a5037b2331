import { Effectiveness, type DecisionRecord, type OwnerPerformance } from '../models/decision.js';
import { mean } from './metrics.js';
import { timeToOutcome } from './time-to-outcome.js';

function compareOwners(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Per-owner decision count, effective share and mean time to outcome.
 * Rows are ordered by owner name (code-unit order) so repeated calls on the
 * same input render identically.
 */
export function ownerPerformance(records: readonly DecisionRecord[]): OwnerPerformance[] {
  const byOwner = new Map<string, DecisionRecord[]>();
  for (const record of records) {
    const group = byOwner.get(record.owner);
    if (group) {
      group.push(record);
    } else {
      byOwner.set(record.owner, [record]);
    }
  }

  return [...byOwner.keys()]
    .sort(compareOwners)
    .map((owner) => {
      const group = byOwner.get(owner) ?? [];
      const effective = group.filter((r) => r.effectiveness === Effectiveness.Effective).length;
      return {
        owner,
        decisionsMade: group.length,
        percentEffective: (100 * effective) / group.length,
        avgTimeToOutcome: mean(group.map(timeToOutcome)),
      };
    });
}
