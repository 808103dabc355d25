/**
 * @fileoverview Artifact Store
 *
 * Loads the trained logistic model, the feature scaler, the winsorization
 * limits and (optionally) descriptive statistics from the first candidate
 * directory that exists. Loaded once at startup; everything it returns is
 * deep-frozen.
 *
 * @module core/artifacts/artifact-store
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import path from 'node:path';

import {
  FEATURE_NAMES,
  assertFeatureAlignment,
  err,
  ok,
  type AlignmentStage,
  type Result,
  type ScoringArtifacts,
} from '@avfrisk/domain';
import {
  DescriptiveStatsSchema,
  ModelArtifactSchema,
  ScalerArtifactSchema,
  WinsorLimitsSchema,
  type DescriptiveStats,
  type ModelParams,
  type ScalerParams,
  type WinsorLimits,
} from '@avfrisk/types';
import type { z } from 'zod';

import { FatalConfigurationError, toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * File names inside an artifact directory
 */
export const ARTIFACT_FILES = Object.freeze({
  model: 'lr_model.json',
  scaler: 'scaler.json',
  winsorLimits: 'winsor_limits.json',
  stats: 'data_stats.json',
});

export interface ArtifactBundle {
  readonly model: ModelParams;
  readonly scaler: ScalerParams;
  readonly winsorLimits: WinsorLimits;
  readonly stats?: DescriptiveStats;
}

export interface ArtifactStoreOptions {
  readonly logger?: Logger;
  /** Feature order the model and scaler must match (defaults to FEATURE_NAMES) */
  readonly expectedFeatureNames?: readonly string[];
}

// ============================================================================
// HELPERS
// ============================================================================

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function isDirectory(candidate: string): boolean {
  return existsSync(candidate) && statSync(candidate).isDirectory();
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * First candidate directory that exists
 *
 * @throws FatalConfigurationError when none does
 */
export function resolveArtifactDirectory(candidates: readonly string[]): string {
  const found = candidates.find(isDirectory);
  if (found === undefined) {
    throw new FatalConfigurationError(
      `Model artifact directory not found. Searched: ${candidates.join(', ') || '(none)'}`,
      { details: [...candidates] }
    );
  }
  return found;
}

function readJsonFile(filePath: string): unknown {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new FatalConfigurationError(`Cannot read artifact file ${filePath}`, {
      source: filePath,
      originalError: toError(error),
    });
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new FatalConfigurationError(`Artifact file ${filePath} is not valid JSON`, {
      source: filePath,
      originalError: toError(error),
    });
  }
}

function parseArtifact<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  source: string
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const details = formatIssues(result.error);
    throw new FatalConfigurationError(
      `Artifact ${source} failed validation: ${details.join('; ')}`,
      { source, details }
    );
  }
  return result.data;
}

function loadRequired<S extends z.ZodTypeAny>(directory: string, file: string, schema: S): z.output<S> {
  const filePath = path.join(directory, file);
  return parseArtifact(schema, readJsonFile(filePath), filePath);
}

/**
 * Descriptive statistics only pre-fill input defaults, so a missing or
 * broken file is logged and skipped
 */
function loadOptionalStats(directory: string, log: Logger): DescriptiveStats | undefined {
  const filePath = path.join(directory, ARTIFACT_FILES.stats);
  if (!existsSync(filePath)) {
    log.debug({ file: filePath }, 'Descriptive statistics not found, using fallback defaults');
    return undefined;
  }

  try {
    return parseArtifact(DescriptiveStatsSchema, readJsonFile(filePath), filePath);
  } catch (error) {
    log.warn({ err: error, file: filePath }, 'Descriptive statistics unusable, using fallback defaults');
    return undefined;
  }
}

function assertTrainingOrder(
  stage: AlignmentStage,
  actual: readonly string[],
  expected: readonly string[]
): void {
  try {
    assertFeatureAlignment(stage, actual, expected);
  } catch (error) {
    const cause = toError(error);
    throw new FatalConfigurationError(
      `The ${stage} artifact does not match the expected feature order: ${cause.message}`,
      { source: stage, originalError: cause }
    );
  }
}

// ============================================================================
// STORE
// ============================================================================

/**
 * ArtifactStore
 *
 * Owns the model, scaler, winsorization limits and descriptive statistics
 * for the lifetime of the process. Construct it once through `load` (or
 * `fromArtifacts` for artifacts already in memory) and share the instance;
 * nothing in it can be mutated.
 */
export class ArtifactStore implements ScoringArtifacts {
  readonly model: ModelParams;
  readonly scaler: ScalerParams;
  readonly winsorLimits: WinsorLimits;
  readonly stats: DescriptiveStats | undefined;
  /** Directory the artifacts came from, when loaded from disk */
  readonly directory: string | undefined;

  private constructor(bundle: ArtifactBundle, directory: string | undefined) {
    this.model = deepFreeze(bundle.model);
    this.scaler = deepFreeze(bundle.scaler);
    this.winsorLimits = deepFreeze(bundle.winsorLimits);
    this.stats = bundle.stats ? deepFreeze(bundle.stats) : undefined;
    this.directory = directory;
    Object.freeze(this);
  }

  /**
   * Load artifacts from the first existing candidate directory
   *
   * @throws FatalConfigurationError when no directory exists, a required
   * file is missing or invalid, or the feature order disagrees
   */
  static load(candidates: readonly string[], options: ArtifactStoreOptions = {}): ArtifactStore {
    const log = options.logger ?? defaultLogger;
    const directory = resolveArtifactDirectory(candidates);

    const model = loadRequired(directory, ARTIFACT_FILES.model, ModelArtifactSchema);
    const scaler = loadRequired(directory, ARTIFACT_FILES.scaler, ScalerArtifactSchema);
    const winsorLimits = loadRequired(directory, ARTIFACT_FILES.winsorLimits, WinsorLimitsSchema);
    const stats = loadOptionalStats(directory, log);

    const store = ArtifactStore.verified(
      stats ? { model, scaler, winsorLimits, stats } : { model, scaler, winsorLimits },
      directory,
      options
    );

    log.info(
      {
        directory,
        featureCount: store.model.featureNames.length,
        winsorizedVariables: Object.keys(store.winsorLimits),
        hasStats: store.stats !== undefined,
      },
      'Model artifacts loaded'
    );

    return store;
  }

  /**
   * Same as `load`, reporting failure as a Result
   */
  static tryLoad(
    candidates: readonly string[],
    options: ArtifactStoreOptions = {}
  ): Result<ArtifactStore, FatalConfigurationError> {
    try {
      return ok(ArtifactStore.load(candidates, options));
    } catch (error) {
      if (error instanceof FatalConfigurationError) {
        return err(error);
      }
      throw error;
    }
  }

  /**
   * Wrap artifacts that are already in memory, applying the same checks as
   * `load`
   */
  static fromArtifacts(bundle: ArtifactBundle, options: ArtifactStoreOptions = {}): ArtifactStore {
    const model = parseArtifact(ModelArtifactSchema, bundle.model, 'model');
    const scaler = parseArtifact(ScalerArtifactSchema, bundle.scaler, 'scaler');
    const winsorLimits = parseArtifact(WinsorLimitsSchema, bundle.winsorLimits, 'winsorLimits');
    const stats = bundle.stats
      ? parseArtifact(DescriptiveStatsSchema, bundle.stats, 'stats')
      : undefined;

    return ArtifactStore.verified(
      stats ? { model, scaler, winsorLimits, stats } : { model, scaler, winsorLimits },
      undefined,
      options
    );
  }

  /**
   * Model and scaler must both follow the expected training-time order
   */
  private static verified(
    bundle: ArtifactBundle,
    directory: string | undefined,
    options: ArtifactStoreOptions
  ): ArtifactStore {
    const expected = options.expectedFeatureNames ?? FEATURE_NAMES;
    assertTrainingOrder('model', bundle.model.featureNames, expected);
    assertTrainingOrder('scaler', bundle.scaler.featureNames, expected);
    return new ArtifactStore(bundle, directory);
  }
}
