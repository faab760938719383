export { CorruptionDetector } from './detector.js';
export { STRUCTURAL_RULES, markerRule, compileCustomRules } from './rules.js';
export { measureComposition, type Composition } from './tiers/composition.js';
export type {
  Detection,
  DetectorOptions,
  InspectionReport,
  PatternRule,
  TierName,
} from './types.js';
