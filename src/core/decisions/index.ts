/**
 * Decision analytics — public API
 *
 * Pure, stateless functions over an ordered list of decision records.
 * None of them mutates its input or logs.
 */

export { DecisionLogError, LoadError, InvalidRecordError, type InvalidRecordDetails } from './errors.js';
export { parseDecisionRecord, parseDecisionRecords } from './validate.js';
export { classifyInputType } from './input-type.js';
export { timeToOutcome, toEpochDay } from './time-to-outcome.js';
export { filterDecisions, filterOptions } from './filter.js';
export { summaryMetrics, starDecisions, effectivenessBreakdown } from './metrics.js';
export { inputUsageFrequency } from './input-usage.js';
export { ownerPerformance } from './owner-performance.js';
export { enrichDecisions, timeToImpactPoints } from './enrich.js';
