/**
 * @fileoverview Feature alignment checks
 *
 * Guards every place a computed vector meets artifact parameters. A mismatch
 * is a FeatureShapeError; vectors are never truncated or padded.
 *
 * @module domain/avf-risk/alignment
 */

import { FeatureShapeError } from '../shared/types.js';

export type AlignmentStage = 'scaler' | 'model';

/**
 * Require `actualNames` to equal `expectedNames` in length and, position by
 * position, in name
 */
export function assertFeatureAlignment(
  stage: AlignmentStage,
  actualNames: readonly string[],
  expectedNames: readonly string[]
): void {
  if (actualNames.length !== expectedNames.length) {
    throw new FeatureShapeError(stage, 'length', expectedNames.length, actualNames.length);
  }

  expectedNames.forEach((expected, index) => {
    const actual = actualNames[index] ?? '';
    if (actual !== expected) {
      throw new FeatureShapeError(stage, 'name', expected, actual, index);
    }
  });
}

/**
 * Require a parameter array to hold one entry per feature
 */
export function assertParameterLength(
  stage: AlignmentStage,
  parameter: readonly number[],
  featureCount: number
): void {
  if (parameter.length !== featureCount) {
    throw new FeatureShapeError(stage, 'length', featureCount, parameter.length);
  }
}

/**
 * Indexed read that fails as a shape error instead of yielding undefined
 */
export function valueAt(stage: AlignmentStage, values: readonly number[], index: number): number {
  const value = values[index];
  if (value === undefined) {
    throw new FeatureShapeError(stage, 'length', index + 1, values.length);
  }
  return value;
}
