import type { DecisionRecord, EnrichedDecision, TimeToImpactPoint } from '../models/decision.js';
import { classifyInputType } from './input-type.js';
import { timeToOutcome } from './time-to-outcome.js';

/** Records with their derived fields, as new objects in input order */
export function enrichDecisions(records: readonly DecisionRecord[]): EnrichedDecision[] {
  return records.map((record) => ({
    ...record,
    inputType: classifyInputType(record.inputsUsed),
    timeToOutcomeDays: timeToOutcome(record),
  }));
}

/** Speed-vs-quality series: one point per decision, in input order */
export function timeToImpactPoints(records: readonly DecisionRecord[]): TimeToImpactPoint[] {
  return records.map((record) => ({
    id: record.id,
    owner: record.owner,
    timeToOutcomeDays: timeToOutcome(record),
    effectiveness: record.effectiveness,
    goal: record.goal,
    inputsUsed: record.inputsUsed,
    result: record.result,
  }));
}
