/**
 * @fileoverview Scaler
 *
 * Standardizes an expanded feature vector with the stored per-feature mean
 * and scale.
 *
 * @module domain/avf-risk/scaler
 */

import type { ScalerParams } from '@avfrisk/types';

import { assertFeatureAlignment, assertParameterLength, valueAt } from './alignment.js';
import type { FeatureVector, ScaledFeatureVector } from './types.js';

/**
 * `scaled[i] = (features[i] - mean[i]) / scale[i]`
 *
 * @throws FeatureShapeError when the vector and the scaler disagree in
 * length or feature names
 */
export function standardize(features: FeatureVector, params: ScalerParams): ScaledFeatureVector {
  assertFeatureAlignment('scaler', features.names, params.featureNames);
  assertParameterLength('scaler', features.values, params.featureNames.length);
  assertParameterLength('scaler', params.mean, params.featureNames.length);
  assertParameterLength('scaler', params.scale, params.featureNames.length);

  const values = features.values.map(
    (value, index) =>
      (value - valueAt('scaler', params.mean, index)) / valueAt('scaler', params.scale, index)
  );

  return { kind: 'scaled', names: features.names, values };
}
