/**
 * @fileoverview AVF Risk Domain Types
 *
 * Request-scoped vectors flowing between pipeline stages.
 *
 * @module domain/avf-risk/types
 */

import type { ModelParams, ScalerParams, WinsorLimits } from '@avfrisk/types';

import type { MainEffectFeature } from './constants.js';

/**
 * Transformed main effects: log1p of the winsorized numeric inputs plus the
 * two categorical codes
 */
export type MainEffects = Readonly<Record<MainEffectFeature, number>>;

/**
 * Ordered named scalars, before standardization
 */
export interface FeatureVector {
  readonly kind: 'raw';
  readonly names: readonly string[];
  readonly values: readonly number[];
}

/**
 * Same names and order as the FeatureVector it came from, standardized
 */
export interface ScaledFeatureVector {
  readonly kind: 'scaled';
  readonly names: readonly string[];
  readonly values: readonly number[];
}

/**
 * Read-only artifacts a prediction needs
 */
export interface ScoringArtifacts {
  readonly model: ModelParams;
  readonly scaler: ScalerParams;
  readonly winsorLimits: WinsorLimits;
}
