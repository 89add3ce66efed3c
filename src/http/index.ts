/**
 * HTTP Module
 *
 * Validation adapters and outcome mapping for handlers.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Validation Adapters
// ─────────────────────────────────────────────────────────────────────────────

export { validatePath, validateRequest, validateArgument, readValidated, VALIDATED_ARG } from './validate.js'
export type { AdapterOptions, ValidatedData } from './validate.js'

// ─────────────────────────────────────────────────────────────────────────────
// Outcomes
// ─────────────────────────────────────────────────────────────────────────────

export { toOutcome, runHandler } from './outcome.js'
export type { Outcome } from './outcome.js'
