/**
 * Analysis Options
 *
 * Tolerances are empirical defaults, not fixed constants.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

export const DEFAULT_TOLERANCE_BPM = 5;
export const DEFAULT_VARIANCE_THRESHOLD_BPM = 20;
export const DEFAULT_HIGHLIGHT_LIMIT = 5;

export const analysisOptionsSchema = z.object({
  // Max |a - b| (or octave-shifted difference) still counted as agreement
  toleranceBpm: z.number().finite().min(0).default(DEFAULT_TOLERANCE_BPM),
  // Spread strictly above this flags a file
  varianceThresholdBpm: z.number().finite().min(0).default(DEFAULT_VARIANCE_THRESHOLD_BPM),
  // High-variance files echoed to the console
  highlightLimit: z.number().int().positive().default(DEFAULT_HIGHLIGHT_LIMIT),
});

export type AnalysisOptions = z.infer<typeof analysisOptionsSchema>;
export type AnalysisOptionsInput = z.input<typeof analysisOptionsSchema>;

/**
 * Fill defaults and validate. Throws ValidationError on bad values.
 */
export function resolveAnalysisOptions(input: AnalysisOptionsInput = {}): AnalysisOptions {
  const parsed = analysisOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      issue ? issue.path.join('.') || 'options' : 'options',
      issue?.message ?? 'invalid analysis options',
      { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) }
    );
  }
  return parsed.data;
}
