/**
 * @fileoverview Scorer
 *
 * Logistic model: linear predictor plus a sigmoid that never overflows.
 *
 * @module domain/avf-risk/scorer
 */

import type { ModelParams } from '@avfrisk/types';

import { NumericDomainError } from '../shared/types.js';
import { assertFeatureAlignment, assertParameterLength, valueAt } from './alignment.js';
import type { ScaledFeatureVector } from './types.js';

/**
 * Logistic sigmoid. Only ever exponentiates a non-positive number, so
 * large |z| saturates to 0 or 1 instead of overflowing.
 */
export function sigmoid(z: number): number {
  if (z >= 0) {
    return 1 / (1 + Math.exp(-z));
  }
  const expZ = Math.exp(z);
  return expZ / (1 + expZ);
}

/**
 * `z = intercept + Σ coefficient[i] * scaled[i]`
 */
export function linearPredictor(scaled: ScaledFeatureVector, model: ModelParams): number {
  assertFeatureAlignment('model', scaled.names, model.featureNames);
  assertParameterLength('model', model.coefficients, model.featureNames.length);
  assertParameterLength('model', scaled.values, model.featureNames.length);

  const z = scaled.values.reduce(
    (sum, value, index) => sum + valueAt('model', model.coefficients, index) * value,
    model.intercept
  );

  if (Number.isNaN(z)) {
    throw new NumericDomainError('linearPredictor', z, 'Linear predictor evaluated to NaN');
  }
  return z;
}

/**
 * Probability of AVF dysfunction in [0, 1]
 */
export function score(scaled: ScaledFeatureVector, model: ModelParams): number {
  return sigmoid(linearPredictor(scaled, model));
}
