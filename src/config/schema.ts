import { z } from 'zod';
import { DETECTION_DEFAULTS } from '../detection/types.js';
import { hasNestedQuantifier } from '../detection/rules.js';

const CustomPatternSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  pattern: z.string().min(1).refine(
    (source) => {
      try {
        new RegExp(source);
        return true;
      } catch {
        return false;
      }
    },
    { message: 'Pattern is not a valid regular expression' },
  ).refine(
    (source) => !hasNestedQuantifier(source),
    { message: 'Pattern repeats a group that already contains a quantifier' },
  ),
});

/**
 * Zod schema for output-sentinel configuration.
 * Used to validate environment variables and config file values.
 */
export const OutputSentinelConfigSchema = z.object({
  detection: z.object({
    /** Special-character ratio above which a sample is flagged (0.0 - 1.0). */
    compositionThreshold: z.number().min(0).max(1).default(DETECTION_DEFAULTS.compositionThreshold),
    /** Token leaked as `/TOKEN/`; null disables the marker rule. */
    markerToken: z.string().regex(/^\w+$/).nullable().default(DETECTION_DEFAULTS.markerToken),
    /**
     * Extra structural rules. Each is searched unanchored on every sample, so it
     * must not nest quantifiers: `(a+)+` can backtrack exponentially and is rejected.
     */
    customPatterns: z.array(CustomPatternSchema).default([]),
  }).default({}),

  /** Audit logging of flagged samples. */
  audit: z.object({
    enabled: z.boolean().default(false),
    logDir: z.string().optional(),
  }).default({}),

  /** Logging level. */
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type OutputSentinelConfig = z.infer<typeof OutputSentinelConfigSchema>;
export type LogLevel = OutputSentinelConfig['logLevel'];
