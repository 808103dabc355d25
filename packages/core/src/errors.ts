/**
 * Application error classes
 * These errors provide safe, non-PII error messages for callers
 */

import { DomainError, type DomainErrorCode } from '@avfrisk/domain';

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for a response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Required model artifacts are missing or unusable.
 * Raised during initialization; there is no degraded mode.
 */
export class FatalConfigurationError extends AppError {
  /** Directory or file the failure relates to */
  public readonly source: string | undefined;
  public readonly details: readonly string[];
  public readonly originalError: Error | undefined;

  constructor(
    message: string,
    options: { source?: string; details?: readonly string[]; originalError?: Error } = {}
  ) {
    super(message, 'FATAL_CONFIGURATION_ERROR', 500);
    this.name = 'FatalConfigurationError';
    this.source = options.source;
    this.details = options.details ?? [];
    this.originalError = options.originalError;
  }
}

/**
 * Status codes for pipeline errors surfaced as a failed prediction
 */
const DOMAIN_ERROR_STATUS: Readonly<Record<DomainErrorCode, number>> = {
  VALIDATION_ERROR: 400,
  NUMERIC_DOMAIN_ERROR: 422,
  FEATURE_SHAPE_ERROR: 500,
};

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  if (error instanceof DomainError) {
    return {
      code: error.code,
      message: error.message,
      statusCode: DOMAIN_ERROR_STATUS[error.code],
    };
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}

/**
 * Normalize a thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
