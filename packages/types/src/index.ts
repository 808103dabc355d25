/**
 * AVF Risk Types Package
 *
 * Zod schemas and inferred types shared by the scoring pipeline and the
 * artifact loader.
 *
 * @module @avfrisk/types
 */

export {
  CLINICAL_INPUT_RANGES,
  SexCodeSchema,
  CannulationHistoryCodeSchema,
  RawInputSchema,
  ModelArtifactSchema,
  ScalerArtifactSchema,
  WinsorBoundsSchema,
  WinsorLimitsSchema,
  DescriptiveStatsSchema,
  type SexCode,
  type CannulationHistoryCode,
  type RawInput,
  type WinsorBounds,
  type WinsorLimits,
  type ModelParams,
  type ScalerParams,
  type DescriptiveStats,
  type ContributionDirection,
  type FeatureContribution,
  type PredictionResult,
} from './schemas/avf-risk.js';
