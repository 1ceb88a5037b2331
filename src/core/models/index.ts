export {
  Effectiveness,
  EFFECTIVENESS_VALUES,
  InputType,
  type DecisionRecord,
  type EnrichedDecision,
  type DecisionFilterCriteria,
  type DecisionFilterOptions,
  type SummaryMetrics,
  type EffectivenessBreakdown,
  type InputUsageEntry,
  type OwnerPerformance,
  type TimeToImpactPoint,
} from './decision.js';

export {
  EFFECTIVENESS_LABELS,
  EFFECTIVENESS_COLORS,
  INPUT_TYPE_LABELS,
  parseEffectiveness,
} from './display.js';

export {
  DecisionRecordSchema,
  DecisionDocumentSchema,
  EffectivenessSchema,
} from './schemas.js';
