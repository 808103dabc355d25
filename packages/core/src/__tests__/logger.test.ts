import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  resolveLogLevel,
  REDACTED_FIELDS,
  REDACTION_CENSOR,
} from '../logger.js';
import { createCapturedLogger } from './helpers.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should use the explicit level', () => {
    expect(createLogger({ name: 'test-logger', level: 'debug' }).level).toBe('debug');
  });

  it('should fall back to LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    expect(createLogger({ name: 'test-logger' }).level).toBe('warn');
  });

  it('should bind the correlation ID when given', () => {
    const testLogger = createLogger({ name: 'test-logger', correlationId: 'req-123' });
    expect(testLogger.bindings().correlationId).toBe('req-123');
  });

  it('should bind only the name without a correlation ID', () => {
    expect(createLogger({ name: 'test-logger' }).bindings()).toEqual({ name: 'test-logger' });
  });

  it('should fall back to info for an unknown LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    expect(createLogger({ name: 'test-logger' }).level).toBe('info');
  });

  it('should write the service name on every record', () => {
    const { logger, records } = createCapturedLogger();

    logger.info('hello');
    withCorrelationId(logger, 'req-9').info('again');

    expect(records()[0]?.name).toBe('test');
    expect(records()[1]?.name).toBe('test');
  });

  it('should write the level as a label', () => {
    const { logger, records } = createCapturedLogger();

    logger.warn('careful');

    expect(records()).toHaveLength(1);
    expect(records()[0]?.level).toBe('warn');
    expect(records()[0]?.msg).toBe('careful');
  });

  it('should drop records below the level', () => {
    const { logger, records } = createCapturedLogger('warn');

    logger.info('ignored');

    expect(records()).toEqual([]);
  });
});

describe('redaction', () => {
  it('should redact clinical inputs at the top level', () => {
    const { logger, records } = createCapturedLogger();

    logger.info({ crp: 5, nlr: 3, probability: 0.25 }, 'scored');

    const record = records()[0];
    expect(record?.crp).toBe(REDACTION_CENSOR);
    expect(record?.nlr).toBe(REDACTION_CENSOR);
    expect(record?.probability).toBe(0.25);
  });

  it('should redact one level deep', () => {
    const { logger, records } = createCapturedLogger();

    logger.info({ input: { mlr: 0.4, sex: 1 }, patient: { mrn: 'MRN-0001' } }, 'received');

    expect(records()[0]?.input).toEqual({ mlr: REDACTION_CENSOR, sex: REDACTION_CENSOR });
    expect(records()[0]?.patient).toEqual({ mrn: REDACTION_CENSOR });
  });

  it('should redact a nested patient name', () => {
    const { logger, records } = createCapturedLogger();

    logger.info({ patient: { name: 'Test Patient' } }, 'received');

    expect(records()[0]?.patient).toEqual({ name: REDACTION_CENSOR });
    expect(records()[0]?.name).toBe('test');
  });

  it('should cover every raw clinical variable', () => {
    for (const field of ['mlr', 'crp', 'nlr', 'triglycerides', 'ijvc', 'sex']) {
      expect(REDACTED_FIELDS).toContain(field);
    }
  });
});

describe('resolveLogLevel', () => {
  it('should keep known levels', () => {
    expect(resolveLogLevel('silent')).toBe('silent');
    expect(resolveLogLevel('debug')).toBe('debug');
  });

  it('should default missing or unknown levels to info', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});

describe('withCorrelationId', () => {
  it('should add the correlation ID to every record of the child', () => {
    const { logger, records } = createCapturedLogger();

    withCorrelationId(logger, 'corr-42').info('child message');

    expect(records()[0]?.correlationId).toBe('corr-42');
  });
});

describe('generateCorrelationId', () => {
  it('should produce distinct timestamp-prefixed IDs', () => {
    const first = generateCorrelationId();
    const second = generateCorrelationId();

    expect(first).toMatch(/^\d+-[a-z0-9]+$/);
    expect(first).not.toBe(second);
  });
});
