/**
 * @avfrisk/core
 *
 * Artifact loading, configuration, logging and request orchestration around
 * the pure scoring pipeline in @avfrisk/domain.
 */

export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  resolveLogLevel,
  logger,
  REDACTED_FIELDS,
  REDACTION_CENSOR,
  type CreateLoggerOptions,
  type Logger,
} from './logger.js';

export {
  AppError,
  FatalConfigurationError,
  isOperationalError,
  toSafeErrorResponse,
  toError,
  type SafeErrorDetails,
} from './errors.js';

export {
  validateEnv,
  getEnv,
  getArtifactSearchPaths,
  DEFAULT_ARTIFACT_DIRS,
  LogLevelSchema,
  type Env,
  type LogLevel,
} from './env.js';

export {
  ArtifactStore,
  ARTIFACT_FILES,
  resolveArtifactDirectory,
  type ArtifactBundle,
  type ArtifactStoreOptions,
} from './artifacts/artifact-store.js';

export {
  AvfRiskEngine,
  createAvfRiskEngine,
  type AvfRiskEngineDeps,
  type PredictOptions,
  type PredictionMetricsCollector,
  type BatchPredictionResult,
  type CreateAvfRiskEngineOptions,
} from './clinical/avf-risk-engine.js';
