/**
 * @fileoverview AVF Risk Feature Layout
 *
 * The feature order the model and scaler were fitted on. Every stage reads
 * its ordering from here; nothing is derived from object key order.
 *
 * @module domain/avf-risk/constants
 */

// ============================================================================
// RAW VARIABLES
// ============================================================================

/**
 * Numeric variables that are winsorized and log1p-transformed, keyed as in
 * the winsorization artifact
 */
export const NUMERIC_VARIABLES = Object.freeze(['MLR', 'CRP', 'triglycerides', 'NLR'] as const);

export type NumericVariable = (typeof NUMERIC_VARIABLES)[number];

// ============================================================================
// FEATURE ORDER
// ============================================================================

/**
 * Main effects, in training order
 */
export const MAIN_EFFECT_FEATURES = Object.freeze([
  'log_MLR',
  'log_CRP',
  'log_triglycerides',
  'log_NLR',
  'IJVC',
  'sex',
] as const);

export type MainEffectFeature = (typeof MAIN_EFFECT_FEATURES)[number];

export type InteractionPair = readonly [MainEffectFeature, MainEffectFeature];

/**
 * All C(6,2) interaction pairs: each main effect with every one after it,
 * walking MAIN_EFFECT_FEATURES in order.
 */
export const INTERACTION_PAIRS: readonly InteractionPair[] = Object.freeze([
  ['log_MLR', 'log_CRP'],
  ['log_MLR', 'log_triglycerides'],
  ['log_MLR', 'log_NLR'],
  ['log_MLR', 'IJVC'],
  ['log_MLR', 'sex'],
  ['log_CRP', 'log_triglycerides'],
  ['log_CRP', 'log_NLR'],
  ['log_CRP', 'IJVC'],
  ['log_CRP', 'sex'],
  ['log_triglycerides', 'log_NLR'],
  ['log_triglycerides', 'IJVC'],
  ['log_triglycerides', 'sex'],
  ['log_NLR', 'IJVC'],
  ['log_NLR', 'sex'],
  ['IJVC', 'sex'],
] as const);

export const INTERACTION_SEPARATOR = '*';

export function interactionName([left, right]: InteractionPair): string {
  return `${left}${INTERACTION_SEPARATOR}${right}`;
}

/**
 * Full expanded feature order: 6 main effects then 15 interactions
 */
export const FEATURE_NAMES: readonly string[] = Object.freeze([
  ...MAIN_EFFECT_FEATURES,
  ...INTERACTION_PAIRS.map(interactionName),
]);

export const FEATURE_COUNT = 21;

// ============================================================================
// DISPLAY LABELS
// ============================================================================

const MAIN_EFFECT_LABELS: Readonly<Record<MainEffectFeature, string>> = {
  log_MLR: 'MLR (Inflammation)',
  log_CRP: 'CRP (Inflammation)',
  log_triglycerides: 'Triglycerides (Lipids)',
  log_NLR: 'NLR (Inflammation)',
  IJVC: 'Hx of IJV Cannulation',
  sex: 'Sex',
};

const SHORT_LABELS: Readonly<Record<MainEffectFeature, string>> = {
  log_MLR: 'MLR',
  log_CRP: 'CRP',
  log_triglycerides: 'TG',
  log_NLR: 'NLR',
  IJVC: 'IJVC',
  sex: 'Sex',
};

/**
 * Human-readable labels for every expanded feature
 */
export const DEFAULT_FEATURE_LABELS: Readonly<Record<string, string>> = Object.freeze({
  ...MAIN_EFFECT_LABELS,
  ...Object.fromEntries(
    INTERACTION_PAIRS.map((pair) => [
      interactionName(pair),
      `Interaction: ${SHORT_LABELS[pair[0]]} x ${SHORT_LABELS[pair[1]]}`,
    ])
  ),
});

/** Number of contributions a summary view shows */
export const DEFAULT_TOP_CONTRIBUTIONS = 6;
