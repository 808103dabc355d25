import { fileURLToPath } from 'node:url';

import type { LogLevel } from '../env.js';
import { createLogger, type Logger } from '../logger.js';

export const FIXTURE_MODELS_DIR = fileURLToPath(new URL('./fixtures/models', import.meta.url));

export interface CapturedLogger {
  readonly logger: Logger;
  /** Parsed log records, oldest first */
  readonly records: () => Record<string, unknown>[];
}

/**
 * Logger writing JSON lines into memory
 */
export function createCapturedLogger(
  level: LogLevel = 'info',
  correlationId?: string
): CapturedLogger {
  const lines: string[] = [];
  const logger = createLogger({
    name: 'test',
    level,
    ...(correlationId ? { correlationId } : {}),
    destination: { write: (line: string) => lines.push(line) },
  });

  return {
    logger,
    records: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

export const silentLogger = createLogger({ name: 'test', level: 'silent' });

/** MLR 0.4, CRP 5.0, TG 1.5, NLR 3.0, no IJV cannulation, male */
export const REFERENCE_INPUT = {
  mlr: 0.4,
  crp: 5.0,
  triglycerides: 1.5,
  nlr: 3.0,
  ijvc: 2,
  sex: 1,
};

/** Outliers on MLR, CRP and NLR; prior IJV cannulation, female */
export const OUTLIER_INPUT = {
  mlr: 3.5,
  crp: 120,
  triglycerides: 1.5,
  nlr: 12,
  ijvc: 1,
  sex: 2,
};
