import type { DecisionRecord } from '../models/decision.js';
import { InvalidRecordError } from './errors.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parse YYYY-MM-DD into a UTC day number, or null when it is not a real date */
export function toEpochDay(date: string): number | null {
  const match = CALENDAR_DATE_PATTERN.exec(date);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // setUTCFullYear keeps years 0-99 literal; Date.UTC maps them to 19xx
  const check = new Date(0);
  check.setUTCFullYear(year, month - 1, day);
  const ms = check.getTime();
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return ms / MS_PER_DAY;
}

/**
 * Whole days between a decision and its measured outcome.
 *
 * @throws InvalidRecordError when a date is not a calendar date or the
 *   outcome precedes the decision
 */
export function timeToOutcome(record: DecisionRecord): number {
  const decisionDay = toEpochDay(record.decisionDate);
  const outcomeDay = toEpochDay(record.outcomeDate);

  const issues: string[] = [];
  if (decisionDay === null) issues.push(`decisionDate: invalid calendar date "${record.decisionDate}"`);
  if (outcomeDay === null) issues.push(`outcomeDate: invalid calendar date "${record.outcomeDate}"`);
  if (decisionDay === null || outcomeDay === null) {
    throw new InvalidRecordError({ recordId: record.id, issues });
  }

  const days = outcomeDay - decisionDay;
  if (days < 0) {
    throw new InvalidRecordError({
      recordId: record.id,
      issues: ['outcomeDate must not be before decisionDate'],
    });
  }
  return days;
}
