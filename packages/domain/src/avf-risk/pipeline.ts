/**
 * @fileoverview Scoring pipeline
 *
 * Preprocess → expand → standardize → score → explain, each stage fed only
 * by the previous one. Pure: artifacts are read, never written.
 *
 * @module domain/avf-risk/pipeline
 */

import type { FeatureContribution, RawInput } from '@avfrisk/types';

import { explain, type FeatureLabelMap } from './explainer.js';
import { expandFeatures } from './feature-expander.js';
import { preprocess } from './preprocessor.js';
import { standardize } from './scaler.js';
import { linearPredictor, sigmoid } from './scorer.js';
import type { FeatureVector, MainEffects, ScaledFeatureVector, ScoringArtifacts } from './types.js';

/**
 * Every intermediate of one prediction
 */
export interface ScoringTrace {
  readonly mainEffects: MainEffects;
  readonly features: FeatureVector;
  readonly scaled: ScaledFeatureVector;
  readonly linearPredictor: number;
  readonly probability: number;
  readonly contributions: readonly FeatureContribution[];
}

export function runScoringPipeline(
  input: RawInput,
  artifacts: ScoringArtifacts,
  labelMap?: FeatureLabelMap
): ScoringTrace {
  const mainEffects = preprocess(input, artifacts.winsorLimits);
  const features = expandFeatures(mainEffects);
  const scaled = standardize(features, artifacts.scaler);
  const z = linearPredictor(scaled, artifacts.model);

  return {
    mainEffects,
    features,
    scaled,
    linearPredictor: z,
    probability: sigmoid(z),
    contributions: explain(scaled, artifacts.model, labelMap),
  };
}
