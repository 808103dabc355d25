/**
 * @fileoverview Domain Package Exports
 *
 * Pure scoring pipeline for arteriovenous fistula dysfunction risk. No I/O:
 * artifacts come in as arguments and every call allocates its own vectors.
 *
 * @module @avfrisk/domain
 *
 * @example
 * ```typescript
 * import { runScoringPipeline } from '@avfrisk/domain';
 *
 * const trace = runScoringPipeline(input, { model, scaler, winsorLimits });
 * trace.probability; // 0..1
 * trace.contributions[0]; // strongest driver
 * ```
 */

// ============================================================================
// SHARED
// ============================================================================

export * from './shared/index.js';

// ============================================================================
// AVF RISK SCORING
// ============================================================================

export * from './avf-risk/index.js';
