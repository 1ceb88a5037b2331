/**
 * Validation of raw decision input into immutable DecisionRecords.
 */

import { DecisionRecordSchema } from '../models/schemas.js';
import type { DecisionRecord } from '../models/decision.js';
import { InvalidRecordError } from './errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function rawRecordId(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;
  return typeof raw.id === 'string' && raw.id.trim().length > 0 ? raw.id : undefined;
}

/**
 * Validate one raw record.
 *
 * @throws InvalidRecordError listing every schema issue
 */
export function parseDecisionRecord(raw: unknown, index: number): DecisionRecord {
  const result = DecisionRecordSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.map((segment) => String(segment)).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidRecordError({ recordId: rawRecordId(raw), index, issues });
  }
  return Object.freeze({ ...result.data });
}

/**
 * Validate an ordered list of raw records, enforcing id uniqueness.
 * Returns a frozen array of frozen records in input order.
 */
export function parseDecisionRecords(raws: readonly unknown[]): readonly DecisionRecord[] {
  const seen = new Map<string, number>();
  const records: DecisionRecord[] = [];

  raws.forEach((raw, index) => {
    const record = parseDecisionRecord(raw, index);
    const firstIndex = seen.get(record.id);
    if (firstIndex !== undefined) {
      throw new InvalidRecordError({
        recordId: record.id,
        index,
        issues: [`id: duplicate id (first used by record #${firstIndex})`],
      });
    }
    seen.set(record.id, index);
    records.push(record);
  });

  return Object.freeze(records);
}
