import type { Detection, TierName } from '../types.js';

/**
 * Common interface of the detection stages.
 * `flags` answers the yes/no question and may stop at the first hit;
 * `analyze` reports everything the stage finds.
 */
export interface DetectionTier {
  readonly tierName: TierName;
  flags(text: string): boolean;
  analyze(text: string): Detection[];
}
