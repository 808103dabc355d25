/**
 * @fileoverview Tests for Shared Domain Types
 * Result pattern helpers and the domain error hierarchy
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ok,
  err,
  isOk,
  isErr,
  unwrap,
  unwrapOr,
  DomainError,
  ValidationError,
  NumericDomainError,
  FeatureShapeError,
  type Result,
} from '../shared/types.js';

describe('Result Pattern Utilities', () => {
  it('should create success and failure results', () => {
    const success = ok(42);
    const failure = err(new Error('boom'));

    expect(success).toEqual({ success: true, value: 42 });
    expect(failure.success).toBe(false);
    expect(failure.error.message).toBe('boom');
  });

  it('should narrow with isOk and isErr', () => {
    const success: Result<number, string> = ok(1);
    const failure: Result<number, string> = err('bad');

    expect(isOk(success) && success.value).toBe(1);
    expect(isErr(failure) && failure.error).toBe('bad');
    expect(isOk(failure)).toBe(false);
    expect(isErr(success)).toBe(false);
  });

  it('should unwrap success and throw the failure', () => {
    const failure = new Error('unwrapped failure');

    expect(unwrap(ok('value'))).toBe('value');
    expect(() => unwrap(err(failure))).toThrow(failure);
  });

  it('should fall back with unwrapOr', () => {
    expect(unwrapOr(ok(1), 0)).toBe(1);
    expect(unwrapOr(err('bad'), 0)).toBe(0);
  });
});

describe('DomainError', () => {
  it('should serialize code and details', () => {
    const error = new DomainError('VALIDATION_ERROR', 'bad input', { field: 'crp' });
    const json = error.toJSON();

    expect(json.name).toBe('DomainError');
    expect(json.code).toBe('VALIDATION_ERROR');
    expect(json.message).toBe('bad input');
    expect(json.details).toEqual({ field: 'crp' });
  });

  it('should keep the prototype chain for subclasses', () => {
    const error = new NumericDomainError('CRP', -2);

    expect(error).toBeInstanceOf(NumericDomainError);
    expect(error).toBeInstanceOf(DomainError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('ValidationError', () => {
  it('should group zod issues by field path', () => {
    const schema = z.object({ crp: z.number().min(0), nested: z.object({ nlr: z.number() }) });
    const parsed = schema.safeParse({ crp: -1, nested: { nlr: 'x' } });
    if (parsed.success) throw new Error('expected parse failure');

    const error = ValidationError.fromZodError(parsed.error);

    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Validation failed');
    expect(Object.keys(error.fieldErrors).sort()).toEqual(['crp', 'nested.nlr']);
    expect(error.fieldErrors.crp).toHaveLength(1);
  });

  it('should key root-level issues as _root', () => {
    const parsed = z.number().safeParse('not a number');
    if (parsed.success) throw new Error('expected parse failure');

    expect(Object.keys(ValidationError.fromZodError(parsed.error).fieldErrors)).toEqual(['_root']);
  });
});

describe('NumericDomainError', () => {
  it('should carry the offending variable and value', () => {
    const error = new NumericDomainError('MLR', -1);

    expect(error.code).toBe('NUMERIC_DOMAIN_ERROR');
    expect(error.variable).toBe('MLR');
    expect(error.value).toBe(-1);
    expect(error.message).toBe('Value -1 for MLR is outside the domain of log1p (must be >= -1)');
  });
});

describe('FeatureShapeError', () => {
  it('should describe a length mismatch', () => {
    const error = new FeatureShapeError('scaler', 'length', 21, 20);

    expect(error.code).toBe('FEATURE_SHAPE_ERROR');
    expect(error.message).toBe('Feature count mismatch at scaler: expected 21, got 20');
  });

  it('should describe a name mismatch with its index', () => {
    const error = new FeatureShapeError('model', 'name', 'log_CRP', 'log_NLR', 1);

    expect(error.message).toBe(
      'Feature name mismatch at model index 1: expected "log_CRP", got "log_NLR"'
    );
    expect(error.details).toEqual({
      stage: 'model',
      mismatch: 'name',
      expected: 'log_CRP',
      actual: 'log_NLR',
      index: 1,
    });
  });
});
