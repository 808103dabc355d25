/**
 * @fileoverview AVF Risk Scoring
 *
 * @module domain/avf-risk
 */

export * from './constants.js';
export * from './types.js';
export { normalizeVariableName, lookupVariable } from './variable-lookup.js';
export { assertFeatureAlignment, type AlignmentStage } from './alignment.js';
export { findWinsorBounds, safeLog1p, clampAndTransform, preprocess } from './preprocessor.js';
export { expandFeatures } from './feature-expander.js';
export { standardize } from './scaler.js';
export { sigmoid, linearPredictor, score } from './scorer.js';
export {
  contributionDirection,
  computeContributions,
  explain,
  topContributions,
  type FeatureLabelMap,
} from './explainer.js';
export {
  MEDIAN_STAT_KEY,
  FALLBACK_INPUT_DEFAULTS,
  medianOf,
  resolveInputDefaults,
} from './input-defaults.js';
export { runScoringPipeline, type ScoringTrace } from './pipeline.js';
