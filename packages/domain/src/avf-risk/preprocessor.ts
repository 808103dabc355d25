/**
 * @fileoverview Preprocessor
 *
 * Winsorizes each numeric input to its training-time bounds, then applies
 * log1p. Mirrors the transform applied when the model was fitted.
 *
 * @module domain/avf-risk/preprocessor
 */

import type { RawInput, WinsorBounds, WinsorLimits } from '@avfrisk/types';

import { NumericDomainError } from '../shared/types.js';
import type { MainEffects } from './types.js';
import { lookupVariable } from './variable-lookup.js';

/**
 * Find the winsorization bounds for a variable, ignoring case and
 * surrounding whitespace
 */
export function findWinsorBounds(
  variableName: string,
  limits: WinsorLimits
): Readonly<WinsorBounds> | undefined {
  return lookupVariable(limits, variableName);
}

/**
 * log1p restricted to its real domain. Values at or below -1, NaN and
 * infinities raise NumericDomainError.
 */
export function safeLog1p(value: number, variableName: string): number {
  if (!Number.isFinite(value) || value <= -1) {
    throw new NumericDomainError(variableName, value);
  }
  return Math.log1p(value);
}

/**
 * Clamp a raw value to its winsorization bounds (when the variable has any)
 * and log1p-transform it
 *
 * @example
 * ```typescript
 * clampAndTransform(80, 'CRP', { crp: { lower: 0, upper: 50 } }); // Math.log1p(50)
 * clampAndTransform(0.4, 'MLR', {}); // Math.log1p(0.4), no clamping
 * ```
 */
export function clampAndTransform(
  rawValue: number,
  variableName: string,
  limits: WinsorLimits
): number {
  const bounds = findWinsorBounds(variableName, limits);
  const clamped = bounds ? Math.max(bounds.lower, Math.min(rawValue, bounds.upper)) : rawValue;
  return safeLog1p(clamped, variableName);
}

/**
 * Transform the six raw inputs into the six main effects.
 * Categorical codes pass through unchanged.
 */
export function preprocess(input: RawInput, limits: WinsorLimits): MainEffects {
  return {
    log_MLR: clampAndTransform(input.mlr, 'MLR', limits),
    log_CRP: clampAndTransform(input.crp, 'CRP', limits),
    log_triglycerides: clampAndTransform(input.triglycerides, 'triglycerides', limits),
    log_NLR: clampAndTransform(input.nlr, 'NLR', limits),
    IJVC: input.ijvc,
    sex: input.sex,
  };
}
