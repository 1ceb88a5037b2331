/**
 * Presentation-independent view model of the decision dashboard.
 *
 * Every value a surface needs is precomputed here; renderers only lay
 * it out.
 */

import type {
  DecisionFilterOptions,
  DecisionRecord,
  Effectiveness,
  EnrichedDecision,
  InputType,
  OwnerPerformance,
  SummaryMetrics,
  TimeToImpactPoint,
} from '../../core/models/decision.js';

export interface MetricTile {
  readonly label: string;
  readonly value: string;
}

/** Criteria as plain arrays, echoed back for display */
export interface ActiveCriteria {
  readonly owners: string[];
  readonly teams: string[];
  readonly effectiveness: Effectiveness[];
}

export interface EffectivenessBar {
  readonly effectiveness: Effectiveness;
  readonly label: string;
  readonly color: string;
  readonly count: number;
}

export interface InputUsageRow {
  readonly inputType: InputType;
  readonly inputTypeLabel: string;
  readonly inputsUsedText: string;
  readonly count: number;
}

export interface DashboardView {
  readonly title: string;
  readonly caption: string;
  readonly filterOptions: DecisionFilterOptions;
  readonly criteria: ActiveCriteria;
  /** Computed over the full, unfiltered set */
  readonly summary: SummaryMetrics;
  readonly metrics: MetricTile[];
  readonly starDecisions: DecisionRecord[];
  readonly decisions: EnrichedDecision[];
  readonly effectivenessChart: EffectivenessBar[];
  readonly timeToImpact: TimeToImpactPoint[];
  readonly inputUsage: InputUsageRow[];
  /** Percent and day values rounded to one decimal */
  readonly ownerPerformance: OwnerPerformance[];
  readonly recommendations: readonly string[];
}
