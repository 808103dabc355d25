/**
 * @fileoverview Input defaults
 *
 * Pre-fill values for an input form: the training-cohort median of each
 * numeric variable when descriptive statistics were shipped with the model,
 * fixed fallbacks otherwise.
 *
 * @module domain/avf-risk/input-defaults
 */

import type { DescriptiveStats, RawInput } from '@avfrisk/types';

import type { NumericVariable } from './constants.js';
import { lookupVariable } from './variable-lookup.js';

export const MEDIAN_STAT_KEY = '50%';

export const FALLBACK_INPUT_DEFAULTS: Readonly<RawInput> = Object.freeze({
  mlr: 0.4,
  crp: 5.0,
  triglycerides: 1.5,
  nlr: 3.0,
  ijvc: 1,
  sex: 1,
});

/**
 * Median of a variable from descriptive statistics, when present and finite
 */
export function medianOf(
  stats: DescriptiveStats | undefined,
  variable: NumericVariable
): number | undefined {
  if (!stats) return undefined;
  const median = lookupVariable(stats, variable)?.[MEDIAN_STAT_KEY];
  return typeof median === 'number' && Number.isFinite(median) ? median : undefined;
}

export function resolveInputDefaults(stats?: DescriptiveStats): RawInput {
  return {
    mlr: medianOf(stats, 'MLR') ?? FALLBACK_INPUT_DEFAULTS.mlr,
    crp: medianOf(stats, 'CRP') ?? FALLBACK_INPUT_DEFAULTS.crp,
    triglycerides: medianOf(stats, 'triglycerides') ?? FALLBACK_INPUT_DEFAULTS.triglycerides,
    nlr: medianOf(stats, 'NLR') ?? FALLBACK_INPUT_DEFAULTS.nlr,
    ijvc: FALLBACK_INPUT_DEFAULTS.ijvc,
    sex: FALLBACK_INPUT_DEFAULTS.sex,
  };
}
