import type { DetectionTier } from './base-tier.js';
import type { Detection } from '../types.js';

// Underscore counts as a word character
const SPECIAL_CHAR = /[^\p{L}\p{N}_\s]/gu;

export interface Composition {
  /** Code points that are not letters, numbers, underscore or whitespace. */
  specialCount: number;
  /** Total code points. */
  length: number;
  ratio: number;
}

/** Measures special-character density. An empty sample has ratio 0. */
export function measureComposition(text: string): Composition {
  const length = Array.from(text).length;
  if (length === 0) return { specialCount: 0, length: 0, ratio: 0 };

  const specialCount = text.match(SPECIAL_CHAR)?.length ?? 0;
  return { specialCount, length, ratio: specialCount / length };
}

/**
 * Stage 2: Character Composition
 * Generic fallback for corruption no structural rule describes: flags a sample
 * whose special-character ratio is strictly above the threshold.
 */
export class CompositionTier implements DetectionTier {
  readonly tierName = 'composition' as const;

  constructor(private readonly threshold: number) {}

  flags(text: string): boolean {
    return measureComposition(text).ratio > this.threshold;
  }

  analyze(text: string): Detection[] {
    const { specialCount, length, ratio } = measureComposition(text);
    if (ratio <= this.threshold) return [];

    return [{
      tier: 'composition',
      ruleId: 'COMP-001',
      ruleName: 'Special Character Density',
      matchedContent: `${specialCount} of ${length} characters are special`,
      matchOffset: 0,
      matchLength: 0,
      metadata: { specialCount, length, ratio, threshold: this.threshold },
    }];
  }
}
