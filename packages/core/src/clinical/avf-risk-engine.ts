/**
 * @fileoverview AVF Risk Engine
 *
 * Request-level orchestration of the scoring pipeline.
 * Validates the raw input at the boundary, runs the pure domain pipeline
 * against the shared read-only artifacts, and logs the outcome.
 *
 * @module core/clinical/avf-risk-engine
 */

import {
  FeatureShapeError,
  ValidationError,
  err,
  ok,
  resolveInputDefaults,
  runScoringPipeline,
  type FeatureLabelMap,
  type Result,
} from '@avfrisk/domain';
import { RawInputSchema, type PredictionResult, type RawInput } from '@avfrisk/types';

import { ArtifactStore, type ArtifactStoreOptions } from '../artifacts/artifact-store.js';
import { getArtifactSearchPaths, validateEnv } from '../env.js';
import { toSafeErrorResponse, type SafeErrorDetails } from '../errors.js';
import {
  createLogger,
  generateCorrelationId,
  logger as defaultLogger,
  withCorrelationId,
  type Logger,
} from '../logger.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Metrics collector interface
 */
export interface PredictionMetricsCollector {
  recordPrediction(probability: number, durationMs: number): void;
  recordFailure(code: string): void;
}

/**
 * Engine dependencies
 */
export interface AvfRiskEngineDeps {
  readonly artifacts: ArtifactStore;
  readonly logger?: Logger;
  /** Display labels for contributions (defaults to DEFAULT_FEATURE_LABELS) */
  readonly labelMap?: FeatureLabelMap;
  readonly metricsCollector?: PredictionMetricsCollector;
}

export interface PredictOptions {
  readonly correlationId?: string;
}

/**
 * Batch prediction result; each item succeeds or fails on its own
 */
export interface BatchPredictionResult {
  readonly successCount: number;
  readonly failureCount: number;
  readonly results: ReadonlyArray<Result<PredictionResult, SafeErrorDetails>>;
}

// ============================================================================
// ENGINE
// ============================================================================

/**
 * AvfRiskEngine
 *
 * Stateless apart from the injected artifacts; one instance serves any
 * number of requests.
 */
export class AvfRiskEngine {
  private readonly deps: AvfRiskEngineDeps;
  private readonly logger: Logger;

  constructor(deps: AvfRiskEngineDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Predict the probability of AVF dysfunction for one patient
   *
   * @throws ValidationError when the input is malformed or out of range
   * @throws NumericDomainError when a transform receives an invalid value
   * @throws FeatureShapeError when the artifacts disagree with the pipeline
   */
  predict(input: unknown, options: PredictOptions = {}): PredictionResult {
    const log = withCorrelationId(this.logger, options.correlationId ?? generateCorrelationId());
    const startTime = Date.now();

    try {
      const rawInput = this.validate(input);
      const trace = runScoringPipeline(rawInput, this.deps.artifacts, this.deps.labelMap);
      const durationMs = Date.now() - startTime;

      this.deps.metricsCollector?.recordPrediction(trace.probability, durationMs);
      log.info(
        {
          probability: trace.probability,
          linearPredictor: trace.linearPredictor,
          topFeature: trace.contributions[0]?.feature,
          durationMs,
        },
        'AVF risk prediction completed'
      );

      return {
        probability: trace.probability,
        linearPredictor: trace.linearPredictor,
        intercept: this.deps.artifacts.model.intercept,
        contributions: trace.contributions,
      };
    } catch (error) {
      const safe = toSafeErrorResponse(error);
      this.deps.metricsCollector?.recordFailure(safe.code);

      if (error instanceof FeatureShapeError) {
        log.error({ err: error }, 'Feature vector does not match loaded artifacts');
      } else {
        log.warn({ code: safe.code, reason: safe.message }, 'AVF risk prediction failed');
      }
      throw error;
    }
  }

  /**
   * Same as `predict`, reporting failure as safe error details
   */
  tryPredict(input: unknown, options: PredictOptions = {}): Result<PredictionResult, SafeErrorDetails> {
    try {
      return ok(this.predict(input, options));
    } catch (error) {
      return err(toSafeErrorResponse(error));
    }
  }

  /**
   * Predict for several patients. A failing input is reported in place and
   * does not affect the others.
   */
  predictBatch(inputs: readonly unknown[], options: PredictOptions = {}): BatchPredictionResult {
    const batchId = options.correlationId ?? generateCorrelationId();
    const results = inputs.map((input, index) =>
      this.tryPredict(input, { correlationId: `${batchId}_${index}` })
    );
    const successCount = results.filter((result) => result.success).length;

    return {
      successCount,
      failureCount: results.length - successCount,
      results,
    };
  }

  /**
   * Input pre-fill values derived from the loaded descriptive statistics
   */
  defaults(): RawInput {
    return resolveInputDefaults(this.deps.artifacts.stats);
  }

  private validate(input: unknown): RawInput {
    const parsed = RawInputSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    return parsed.data;
  }
}

// ============================================================================
// INITIALIZATION
// ============================================================================

export interface CreateAvfRiskEngineOptions extends ArtifactStoreOptions {
  /** Environment to read AVF_MODEL_DIR from (defaults to process.env) */
  readonly env?: NodeJS.ProcessEnv;
  readonly labelMap?: FeatureLabelMap;
  readonly metricsCollector?: PredictionMetricsCollector;
}

/**
 * One-time startup: validate the environment, load the artifacts and build
 * the engine. Throws FatalConfigurationError on any configuration problem.
 * Without an injected logger, one is created from SERVICE_NAME and LOG_LEVEL.
 */
export function createAvfRiskEngine(options: CreateAvfRiskEngineOptions = {}): AvfRiskEngine {
  const env = validateEnv(options.env ?? process.env);
  const logger = options.logger ?? createLogger({ name: env.SERVICE_NAME, level: env.LOG_LEVEL });
  const artifacts = ArtifactStore.load(getArtifactSearchPaths(env), { ...options, logger });

  return new AvfRiskEngine({
    artifacts,
    logger,
    ...(options.labelMap && { labelMap: options.labelMap }),
    ...(options.metricsCollector && { metricsCollector: options.metricsCollector }),
  });
}
