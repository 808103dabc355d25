/**
 * @fileoverview FeatureExpander
 *
 * Builds the 21-feature vector: main effects in MAIN_EFFECT_FEATURES order,
 * then the products listed in INTERACTION_PAIRS.
 *
 * @module domain/avf-risk/feature-expander
 */

import { INTERACTION_PAIRS, MAIN_EFFECT_FEATURES, interactionName } from './constants.js';
import type { FeatureVector, MainEffects } from './types.js';

export function expandFeatures(mainEffects: MainEffects): FeatureVector {
  const names: string[] = [];
  const values: number[] = [];

  for (const feature of MAIN_EFFECT_FEATURES) {
    names.push(feature);
    values.push(mainEffects[feature]);
  }

  for (const pair of INTERACTION_PAIRS) {
    const [left, right] = pair;
    names.push(interactionName(pair));
    values.push(mainEffects[left] * mainEffects[right]);
  }

  return { kind: 'raw', names, values };
}
