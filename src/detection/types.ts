/**
 * Core detection type definitions for output-sentinel.
 */

export type TierName = 'structural' | 'composition';

/** A single corruption signature: match anywhere in the sample ⇒ corrupted. */
export interface PatternRule {
  ruleId: string;
  ruleName: string;
  pattern: RegExp;
}

/** A single detection from any tier. */
export interface Detection {
  tier: TierName;
  ruleId: string;
  ruleName: string;
  matchedContent: string;
  matchOffset: number;
  matchLength: number;
  metadata?: Record<string, unknown>;
}

/** Full result of inspecting one sample. */
export interface InspectionReport {
  corrupted: boolean;
  /** Length in code points. */
  length: number;
  compositionRatio: number;
  detections: Detection[];
}

export interface DetectorOptions {
  /** Ratio of special characters above which a sample is flagged. */
  compositionThreshold?: number;
  /** Token leaked between slashes, e.g. `/LIRA/`. `null` disables the rule. */
  markerToken?: string | null;
  /** Additional structural rules, checked after the built-in catalogue. */
  extraRules?: PatternRule[];
}

export const DETECTION_DEFAULTS = {
  compositionThreshold: 0.25,
  markerToken: 'LIRA',
  maxMatchedContent: 80,
} as const;
