import { describe, it, expect } from 'vitest';
import { FeatureShapeError, NumericDomainError, ValidationError } from '@avfrisk/domain';

import {
  AppError,
  FatalConfigurationError,
  isOperationalError,
  toError,
  toSafeErrorResponse,
} from '../errors.js';

describe('AppError', () => {
  it('should expose safe details', () => {
    const error = new AppError('Something went wrong', 'SOME_CODE', 503);

    expect(error.toSafeError()).toEqual({
      code: 'SOME_CODE',
      message: 'Something went wrong',
      statusCode: 503,
    });
    expect(error.isOperational).toBe(true);
  });

  it('should default to status 500', () => {
    expect(new AppError('x', 'X').statusCode).toBe(500);
  });
});

describe('FatalConfigurationError', () => {
  it('should carry source, details and cause', () => {
    const cause = new Error('ENOENT');
    const error = new FatalConfigurationError('Cannot read artifact file Models/scaler.json', {
      source: 'Models/scaler.json',
      details: ['missing'],
      originalError: cause,
    });

    expect(error.name).toBe('FatalConfigurationError');
    expect(error.code).toBe('FATAL_CONFIGURATION_ERROR');
    expect(error.statusCode).toBe(500);
    expect(error.source).toBe('Models/scaler.json');
    expect(error.details).toEqual(['missing']);
    expect(error.originalError).toBe(cause);
    expect(error).toBeInstanceOf(AppError);
  });

  it('should default to no details', () => {
    const error = new FatalConfigurationError('broken');

    expect(error.source).toBeUndefined();
    expect(error.details).toEqual([]);
  });
});

describe('isOperationalError', () => {
  it('should accept application errors only', () => {
    expect(isOperationalError(new FatalConfigurationError('x'))).toBe(true);
    expect(isOperationalError(new Error('x'))).toBe(false);
    expect(isOperationalError('x')).toBe(false);
  });
});

describe('toSafeErrorResponse', () => {
  it('should map configuration failures to 500', () => {
    expect(toSafeErrorResponse(new FatalConfigurationError('Model artifact directory not found'))).toEqual({
      code: 'FATAL_CONFIGURATION_ERROR',
      message: 'Model artifact directory not found',
      statusCode: 500,
    });
  });

  it('should map validation errors to 400', () => {
    expect(toSafeErrorResponse(new ValidationError('Validation failed', { crp: ['Too big'] }))).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      statusCode: 400,
    });
  });

  it('should map numeric domain errors to 422', () => {
    expect(toSafeErrorResponse(new NumericDomainError('CRP', -2)).statusCode).toBe(422);
  });

  it('should map feature shape errors to 500', () => {
    const safe = toSafeErrorResponse(new FeatureShapeError('scaler', 'length', 21, 20));

    expect(safe.code).toBe('FEATURE_SHAPE_ERROR');
    expect(safe.statusCode).toBe(500);
  });

  it('should hide unexpected errors', () => {
    expect(toSafeErrorResponse(new TypeError('secret internals'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
  });
});

describe('toError', () => {
  it('should pass errors through and wrap anything else', () => {
    const error = new Error('kept');

    expect(toError(error)).toBe(error);
    expect(toError('thrown string').message).toBe('thrown string');
  });
});
