/**
 * @fileoverview Shared Domain Types
 *
 * Result pattern and the structured error hierarchy raised by the scoring
 * pipeline.
 *
 * @module domain/shared/types
 */

import type { z } from 'zod';

// ============================================================================
// RESULT PATTERN TYPES
// ============================================================================

export interface Success<T> {
  readonly success: true;
  readonly value: T;
  readonly error?: never;
}

export interface Failure<E> {
  readonly success: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Either a value or an error, for callers that prefer branching over
 * try/catch.
 *
 * @example
 * ```typescript
 * const result = tryPredict(input);
 * if (result.success) {
 *   render(result.value.probability);
 * } else {
 *   report(result.error.code);
 * }
 * ```
 */
export type Result<T, E = Error> = Success<T> | Failure<E>;

export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

export function err<E>(error: E): Failure<E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Success<T> {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is Failure<E> {
  return !result.success;
}

/**
 * Unwrap a result, throwing the error if it's a failure
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.value;
  }
  throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.success ? result.value : defaultValue;
}

// ============================================================================
// DOMAIN ERROR TYPES
// ============================================================================

export type DomainErrorCode = 'VALIDATION_ERROR' | 'NUMERIC_DOMAIN_ERROR' | 'FEATURE_SHAPE_ERROR';

/**
 * Domain error class with structured error information
 */
export class DomainError extends Error {
  constructor(
    public readonly code: DomainErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    Object.setPrototypeOf(this, DomainError.prototype);
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Raw input rejected at the boundary, with field-level details
 */
export class ValidationError extends DomainError {
  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[]>
  ) {
    super('VALIDATION_ERROR', message, { fieldErrors });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static fromZodError(error: z.ZodError): ValidationError {
    const fieldErrors: Record<string, string[]> = {};

    for (const issue of error.issues) {
      const path = issue.path.join('.');
      const key = path || '_root';
      const messages = fieldErrors[key] ?? [];
      messages.push(issue.message);
      fieldErrors[key] = messages;
    }

    return new ValidationError('Validation failed', fieldErrors);
  }
}

/**
 * A transform received a value outside its mathematical domain
 * (e.g. below -1 before log1p).
 */
export class NumericDomainError extends DomainError {
  constructor(
    public readonly variable: string,
    public readonly value: number,
    message = `Value ${value} for ${variable} is outside the domain of log1p (must be >= -1)`
  ) {
    super('NUMERIC_DOMAIN_ERROR', message, { variable, value });
    this.name = 'NumericDomainError';
    Object.setPrototypeOf(this, NumericDomainError.prototype);
  }
}

export type FeatureShapeMismatch = 'length' | 'name';

/**
 * Computed features disagree with the loaded scaler or model parameters.
 * Indicates a stale or mismatched artifact pairing.
 */
export class FeatureShapeError extends DomainError {
  constructor(
    public readonly stage: 'scaler' | 'model',
    public readonly mismatch: FeatureShapeMismatch,
    public readonly expected: number | string,
    public readonly actual: number | string,
    public readonly index?: number
  ) {
    super(
      'FEATURE_SHAPE_ERROR',
      mismatch === 'length'
        ? `Feature count mismatch at ${stage}: expected ${expected}, got ${actual}`
        : `Feature name mismatch at ${stage} index ${index ?? -1}: expected "${expected}", got "${actual}"`,
      { stage, mismatch, expected, actual, index }
    );
    this.name = 'FeatureShapeError';
    Object.setPrototypeOf(this, FeatureShapeError.prototype);
  }
}
