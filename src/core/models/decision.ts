/**
 * Decision log domain types.
 *
 * A decision record captures one operational decision: what was tried,
 * which inputs informed it, and how effective the outcome turned out.
 */

/** Measured effectiveness of a decision's outcome */
export const Effectiveness = {
  Effective: 'Effective',
  SomewhatEffective: 'SomewhatEffective',
  NotEffective: 'NotEffective',
} as const;
export type Effectiveness = typeof Effectiveness[keyof typeof Effectiveness];

/** Enum order; also the category axis order for outcome charts */
export const EFFECTIVENESS_VALUES: readonly Effectiveness[] = [
  Effectiveness.Effective,
  Effectiveness.SomewhatEffective,
  Effectiveness.NotEffective,
];

/** Coarse classification of the evidence behind a decision */
export const InputType = {
  DataAnalysis: 'DataAnalysis',
  Feedback: 'Feedback',
  Observation: 'Observation',
} as const;
export type InputType = typeof InputType[keyof typeof InputType];

export interface DecisionRecord {
  readonly id: string;
  readonly owner: string;
  readonly team: string;
  /** ISO-8601 calendar date (YYYY-MM-DD) */
  readonly decisionDate: string;
  /** ISO-8601 calendar date, never before decisionDate */
  readonly outcomeDate: string;
  readonly goal: string;
  readonly whatWasTried: string;
  readonly inputsUsed: string;
  readonly result: string;
  readonly effectiveness: Effectiveness;
  readonly repeatableWin: boolean;
  /** High-impact exemplar flag, tracked independently of effectiveness */
  readonly starDecision: boolean;
}

/** Decision record with its per-query derived fields */
export interface EnrichedDecision extends DecisionRecord {
  readonly inputType: InputType;
  readonly timeToOutcomeDays: number;
}

/**
 * Filter criteria. Each field lists the allowed values; an omitted or empty
 * field imposes no constraint.
 */
export interface DecisionFilterCriteria {
  readonly owners?: readonly string[] | ReadonlySet<string>;
  readonly teams?: readonly string[] | ReadonlySet<string>;
  readonly effectiveness?: readonly Effectiveness[] | ReadonlySet<Effectiveness>;
}

/** Distinct values available to each filter, in first-seen order */
export interface DecisionFilterOptions {
  readonly owners: string[];
  readonly teams: string[];
  readonly effectiveness: Effectiveness[];
}

export interface SummaryMetrics {
  readonly totalCount: number;
  /** Mean time to outcome in days; 0 for an empty set */
  readonly avgTimeToOutcome: number;
  /** Share of Effective decisions, rounded to a whole percent; 0 for an empty set */
  readonly effectiveRatePercent: number;
  readonly repeatableWinCount: number;
}

export type EffectivenessBreakdown = Record<Effectiveness, number>;

export interface InputUsageEntry {
  readonly inputType: InputType;
  readonly inputsUsedText: string;
  readonly count: number;
}

export interface OwnerPerformance {
  readonly owner: string;
  readonly decisionsMade: number;
  readonly percentEffective: number;
  readonly avgTimeToOutcome: number;
}

/** One point of the time-to-impact (speed vs quality) series */
export interface TimeToImpactPoint {
  readonly id: string;
  readonly owner: string;
  readonly timeToOutcomeDays: number;
  readonly effectiveness: Effectiveness;
  readonly goal: string;
  readonly inputsUsed: string;
  readonly result: string;
}
