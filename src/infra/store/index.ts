export { DecisionStore, describeSource, type DecisionSource } from './DecisionStore.js';
export { readDecisionSource, toRawEntries, SUPPORTED_SOURCE_EXTENSIONS } from './source-reader.js';
