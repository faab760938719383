import type { DetectionTier } from './base-tier.js';
import type { Detection, PatternRule } from '../types.js';
import { DETECTION_DEFAULTS } from '../types.js';

/**
 * Stage 1: Structural Signatures
 * Known, recurring failure shapes of a text generator: leaked formatting
 * syntax, leaked internal tags, degenerate punctuation runs.
 */
export class StructuralTier implements DetectionTier {
  readonly tierName = 'structural' as const;
  private readonly rules: readonly PatternRule[];

  constructor(rules: readonly PatternRule[]) {
    // Strip g/y so matching never depends on lastIndex left by a previous call
    this.rules = rules.map(rule => ({
      ...rule,
      pattern: new RegExp(rule.pattern.source, rule.pattern.flags.replace(/[gy]/g, '')),
    }));
  }

  get ruleIds(): string[] {
    return this.rules.map(r => r.ruleId);
  }

  flags(text: string): boolean {
    return this.rules.some(rule => rule.pattern.test(text));
  }

  analyze(text: string): Detection[] {
    const detections: Detection[] = [];

    for (const rule of this.rules) {
      const match = rule.pattern.exec(text);
      if (match === null) continue;

      detections.push({
        tier: 'structural',
        ruleId: rule.ruleId,
        ruleName: rule.ruleName,
        matchedContent: Array.from(match[0]).slice(0, DETECTION_DEFAULTS.maxMatchedContent).join(''),
        matchOffset: match.index,
        matchLength: match[0].length,
      });
    }

    return detections;
  }
}
