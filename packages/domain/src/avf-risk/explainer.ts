/**
 * @fileoverview Explainer
 *
 * Additive decomposition of the linear predictor: each feature contributes
 * `coefficient × scaled value`, and the contributions plus the intercept sum
 * to z. Positive contributions raise the predicted risk; negative ones are
 * protective.
 *
 * @module domain/avf-risk/explainer
 */

import type { ContributionDirection, FeatureContribution, ModelParams } from '@avfrisk/types';

import { assertFeatureAlignment, assertParameterLength, valueAt } from './alignment.js';
import { DEFAULT_FEATURE_LABELS, DEFAULT_TOP_CONTRIBUTIONS } from './constants.js';
import type { ScaledFeatureVector } from './types.js';

export type FeatureLabelMap = Readonly<Record<string, string>>;

export function contributionDirection(contribution: number): ContributionDirection {
  return contribution > 0 ? 'increases_risk' : 'decreases_risk';
}

/**
 * Contributions in feature order, unsorted
 */
export function computeContributions(
  scaled: ScaledFeatureVector,
  model: ModelParams,
  labelMap: FeatureLabelMap = DEFAULT_FEATURE_LABELS
): FeatureContribution[] {
  assertFeatureAlignment('model', scaled.names, model.featureNames);
  assertParameterLength('model', model.coefficients, model.featureNames.length);

  return model.featureNames.map((feature, index) => {
    const contribution =
      valueAt('model', model.coefficients, index) * valueAt('model', scaled.values, index);
    return {
      feature,
      label: labelMap[feature] ?? feature,
      contribution,
      direction: contributionDirection(contribution),
    };
  });
}

/**
 * Contributions ranked by descending absolute value. Ties keep feature order
 * (Array.prototype.sort is stable).
 */
export function explain(
  scaled: ScaledFeatureVector,
  model: ModelParams,
  labelMap: FeatureLabelMap = DEFAULT_FEATURE_LABELS
): FeatureContribution[] {
  return computeContributions(scaled, model, labelMap).sort(
    (a, b) => Math.abs(b.contribution) - Math.abs(a.contribution)
  );
}

/**
 * Leading entries of an already ranked list
 */
export function topContributions(
  ranked: readonly FeatureContribution[],
  count: number = DEFAULT_TOP_CONTRIBUTIONS
): FeatureContribution[] {
  return ranked.slice(0, Math.max(0, count));
}
