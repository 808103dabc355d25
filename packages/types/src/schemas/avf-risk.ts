/**
 * AVF dysfunction risk schemas
 *
 * Validation for the six clinical inputs, the trained model artifacts loaded
 * from disk, and the shapes the scoring pipeline hands to consumers.
 */
import { z } from 'zod';

// =============================================================================
// Clinical input
// =============================================================================

/**
 * Plausible ranges accepted at the input boundary.
 * Winsorization remains the model's own outlier handling; these only reject
 * values no clinician would enter.
 */
export const CLINICAL_INPUT_RANGES = Object.freeze({
  mlr: { min: 0, max: 10 },
  crp: { min: 0, max: 200 },
  nlr: { min: 0, max: 50 },
  triglycerides: { min: 0, max: 20 },
} as const);

const FiniteNumberSchema = z.number().finite();

const rangedInput = (range: { readonly min: number; readonly max: number }) =>
  FiniteNumberSchema.min(range.min).max(range.max);

/** 1 = Male, 2 = Female */
export const SexCodeSchema = z.union([z.literal(1), z.literal(2)]);

/** History of ipsilateral internal jugular vein cannulation: 1 = Yes, 2 = No */
export const CannulationHistoryCodeSchema = z.union([z.literal(1), z.literal(2)]);

/**
 * Raw clinical input for a single prediction
 */
export const RawInputSchema = z
  .object({
    /** Monocyte-to-lymphocyte ratio */
    mlr: rangedInput(CLINICAL_INPUT_RANGES.mlr),
    /** C-reactive protein (mg/L) */
    crp: rangedInput(CLINICAL_INPUT_RANGES.crp),
    /** Triglycerides (mmol/L) */
    triglycerides: rangedInput(CLINICAL_INPUT_RANGES.triglycerides),
    /** Neutrophil-to-lymphocyte ratio */
    nlr: rangedInput(CLINICAL_INPUT_RANGES.nlr),
    ijvc: CannulationHistoryCodeSchema,
    sex: SexCodeSchema,
  })
  .strict();

// =============================================================================
// Trained artifacts
// =============================================================================

const FeatureNamesSchema = z.array(z.string().trim().min(1)).min(1);
const CoefficientRowSchema = z.array(FiniteNumberSchema).min(1);

function isSingleRowMatrix(value: number[] | [number[]]): value is [number[]] {
  return Array.isArray(value[0]);
}

/**
 * Serialized logistic regression (`lr_model.json`).
 * A fitted binary classifier stores coefficients as a single-row matrix and
 * the intercept as a one-element array; both shapes are flattened here.
 */
export const ModelArtifactSchema = z
  .object({
    featureNames: FeatureNamesSchema,
    coefficients: z
      .union([CoefficientRowSchema, z.tuple([CoefficientRowSchema])])
      .transform((value): number[] => (isSingleRowMatrix(value) ? value[0] : value)),
    intercept: z
      .union([FiniteNumberSchema, z.tuple([FiniteNumberSchema])])
      .transform((value): number => (typeof value === 'number' ? value : value[0])),
  })
  .superRefine((model, ctx) => {
    if (model.coefficients.length !== model.featureNames.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['coefficients'],
        message: `Expected ${model.featureNames.length} coefficients, got ${model.coefficients.length}`,
      });
    }
  });

/**
 * Serialized standard scaler (`scaler.json`)
 */
export const ScalerArtifactSchema = z
  .object({
    featureNames: FeatureNamesSchema,
    mean: z.array(FiniteNumberSchema),
    scale: z.array(
      FiniteNumberSchema.refine((value) => value !== 0, { message: 'Scale must be non-zero' })
    ),
  })
  .superRefine((scaler, ctx) => {
    const expected = scaler.featureNames.length;
    for (const key of ['mean', 'scale'] as const) {
      if (scaler[key].length !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Expected ${expected} ${key} values, got ${scaler[key].length}`,
        });
      }
    }
  });

export const WinsorBoundsSchema = z
  .object({
    lower: FiniteNumberSchema,
    upper: FiniteNumberSchema,
  })
  .refine((bounds) => bounds.lower <= bounds.upper, {
    message: 'Lower bound must not exceed upper bound',
  });

/**
 * Winsorization limits keyed by variable name (`winsor_limits.json`).
 * Keys are matched case-insensitively by the preprocessor.
 */
export const WinsorLimitsSchema = z.record(z.string(), WinsorBoundsSchema);

/**
 * Per-variable summary statistics (`data_stats.json`), e.g. `{ "50%": 0.41 }`.
 * Entries are left unchecked: a categorical column carries strings such as
 * `top`, and consumers type-check the one statistic they read.
 */
export const DescriptiveStatsSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

// =============================================================================
// Types
// =============================================================================

export type SexCode = z.infer<typeof SexCodeSchema>;
export type CannulationHistoryCode = z.infer<typeof CannulationHistoryCodeSchema>;
export type RawInput = z.infer<typeof RawInputSchema>;
export type WinsorBounds = z.infer<typeof WinsorBoundsSchema>;

export interface ModelParams {
  /** Training-time feature order */
  readonly featureNames: readonly string[];
  readonly coefficients: readonly number[];
  readonly intercept: number;
}

export interface ScalerParams {
  readonly featureNames: readonly string[];
  readonly mean: readonly number[];
  readonly scale: readonly number[];
}

export type WinsorLimits = Readonly<Record<string, Readonly<WinsorBounds>>>;

export type DescriptiveStats = Readonly<Record<string, Readonly<Record<string, unknown>>>>;

/**
 * Direction a feature pushes the predicted risk
 */
export type ContributionDirection = 'increases_risk' | 'decreases_risk';

export interface FeatureContribution {
  /** Training-time feature name, e.g. `log_MLR*log_CRP` */
  readonly feature: string;
  /** Display label */
  readonly label: string;
  /** coefficient × scaled value */
  readonly contribution: number;
  readonly direction: ContributionDirection;
}

export interface PredictionResult {
  /** Probability of AVF dysfunction in [0, 1] */
  readonly probability: number;
  /** Pre-sigmoid score (z) */
  readonly linearPredictor: number;
  readonly intercept: number;
  /** Sorted by descending absolute contribution */
  readonly contributions: readonly FeatureContribution[];
}
