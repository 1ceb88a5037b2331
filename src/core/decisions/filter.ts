/**
 * Decision filtering by owner, team and effectiveness.
 */

import type {
  DecisionFilterCriteria,
  DecisionFilterOptions,
  DecisionRecord,
  Effectiveness,
} from '../models/decision.js';

/** An omitted or empty criterion selects everything */
function toConstraint<T>(values: readonly T[] | ReadonlySet<T> | undefined): ReadonlySet<T> | null {
  if (values === undefined) return null;
  const set = new Set(values);
  return set.size > 0 ? set : null;
}

/**
 * Stable filter: a record passes when every non-empty criterion contains
 * the record's corresponding value.
 */
export function filterDecisions(
  records: readonly DecisionRecord[],
  criteria: DecisionFilterCriteria,
): DecisionRecord[] {
  const owners = toConstraint(criteria.owners);
  const teams = toConstraint(criteria.teams);
  const effectiveness = toConstraint<Effectiveness>(criteria.effectiveness);

  return records.filter((record) =>
    (owners === null || owners.has(record.owner))
    && (teams === null || teams.has(record.team))
    && (effectiveness === null || effectiveness.has(record.effectiveness)),
  );
}

/** Distinct owners, teams and effectiveness values, in first-seen order */
export function filterOptions(records: readonly DecisionRecord[]): DecisionFilterOptions {
  const owners = new Set<string>();
  const teams = new Set<string>();
  const effectiveness = new Set<Effectiveness>();

  for (const record of records) {
    owners.add(record.owner);
    teams.add(record.team);
    effectiveness.add(record.effectiveness);
  }

  return {
    owners: [...owners],
    teams: [...teams],
    effectiveness: [...effectiveness],
  };
}
