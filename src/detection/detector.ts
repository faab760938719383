import { StructuralTier } from './tiers/structural.js';
import { CompositionTier, measureComposition } from './tiers/composition.js';
import { STRUCTURAL_RULES, markerRule } from './rules.js';
import {
  DETECTION_DEFAULTS,
  type DetectorOptions,
  type InspectionReport,
  type PatternRule,
} from './types.js';

/**
 * Decides whether generated text needs cleaning:
 *   Structural signatures → Composition ratio → Verdict
 *
 * Both stages can only push a sample toward "corrupted", so the verdict is the
 * OR of the two and stage order affects speed, never the answer.
 */
export class CorruptionDetector {
  private structural: StructuralTier;
  private composition: CompositionTier;

  constructor(options: DetectorOptions = {}) {
    const threshold = options.compositionThreshold ?? DETECTION_DEFAULTS.compositionThreshold;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new RangeError(`compositionThreshold must be within [0, 1], got ${threshold}`);
    }

    const markerToken = options.markerToken === undefined
      ? DETECTION_DEFAULTS.markerToken
      : options.markerToken;

    const rules: PatternRule[] = [...STRUCTURAL_RULES];
    if (markerToken !== null && markerToken.length > 0) {
      rules.push(markerRule(markerToken));
    }
    rules.push(...(options.extraRules ?? []));

    this.structural = new StructuralTier(rules);
    this.composition = new CompositionTier(threshold);
  }

  /** Ids of the structural rules in evaluation order. */
  get ruleIds(): string[] {
    return this.structural.ruleIds;
  }

  /** `true` when the sample is corrupted, `false` when it is acceptable. */
  evaluate(sample: string): boolean {
    return this.structural.flags(sample) || this.composition.flags(sample);
  }

  evaluateBatch(samples: readonly string[]): boolean[] {
    return samples.map(sample => this.evaluate(sample));
  }

  /**
   * Runs every rule without short-circuiting and reports what fired.
   */
  inspect(sample: string): InspectionReport {
    const detections = [
      ...this.structural.analyze(sample),
      ...this.composition.analyze(sample),
    ];
    const { length, ratio } = measureComposition(sample);

    return {
      corrupted: detections.length > 0,
      length,
      compositionRatio: ratio,
      detections,
    };
  }
}
