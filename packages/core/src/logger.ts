import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

import { LogLevelSchema, type LogLevel } from './env.js';

/**
 * Structured logger with patient-data redaction
 * Clinical inputs and identifiers never reach log output in clear text
 */

// Fields to redact wherever they appear at the top level or one level deep
export const REDACTED_FIELDS: readonly string[] = Object.freeze([
  // Patient identifiers
  'patientId',
  'patient_id',
  'mrn',
  'name',
  'firstName',
  'lastName',
  'dateOfBirth',
  'date_of_birth',
  'phone',
  'email',
  // Raw clinical inputs
  'mlr',
  'crp',
  'nlr',
  'triglycerides',
  'ijvc',
  'sex',
  // Credentials
  'password',
  'token',
  'apiKey',
  'authorization',
]);

export const REDACTION_CENSOR = '[REDACTED]';

// Top-level keys the logger writes itself; redacted only when nested
const LOGGER_BINDINGS: readonly string[] = ['name'];

/**
 * Create a redaction config for Pino
 */
function createRedactor(): NonNullable<LoggerOptions['redact']> {
  return {
    paths: [
      ...REDACTED_FIELDS.filter((field) => !LOGGER_BINDINGS.includes(field)),
      ...REDACTED_FIELDS.map((field) => `*.${field}`),
    ],
    censor: REDACTION_CENSOR,
  };
}

/**
 * LOG_LEVEL when it names a known level, `info` otherwise.
 * Startup validation reports a bad value; the logger must not throw first.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : 'info';
}

export interface CreateLoggerOptions {
  name: string;
  level?: LogLevel;
  correlationId?: string;
  /** Output stream (defaults to stdout) */
  destination?: DestinationStream;
}

/**
 * Create a logger instance with redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const {
    name,
    level = resolveLogLevel(process.env.LOG_LEVEL),
    correlationId,
    destination,
  } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Service name on every record; pid and hostname omitted
    base: correlationId ? { name, correlationId } : { name },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

// Default logger instance
export const logger = createLogger({ name: process.env.SERVICE_NAME || 'avf-risk' });

export type { Logger };
