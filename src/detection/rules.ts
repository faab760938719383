import type { PatternRule } from './types.js';

/**
 * Built-in structural signatures of a misbehaving generator.
 *
 * None of these expressions nests a quantifier inside another, so a failed
 * search costs at most quadratic time in the sample length.
 */
export const STRUCTURAL_RULES: readonly PatternRule[] = Object.freeze([
  // Raw code fences have no place in a conversational reply
  { ruleId: 'STRUCT-001', ruleName: 'Fenced Code Block', pattern: /```[^`]*```/ },
  { ruleId: 'STRUCT-002', ruleName: 'Backtick Run', pattern: /`{3,}/ },
  { ruleId: 'STRUCT-003', ruleName: 'Markup Tag', pattern: /<\/?[A-Za-z]+\/?>/ },
  { ruleId: 'STRUCT-004', ruleName: 'Path Fragment', pattern: /\/[A-Za-z/_.]+\// },
  { ruleId: 'STRUCT-005', ruleName: 'Bracket Run', pattern: /[(){}[\]]{3,}/ },
  // (Name:) speaker tags
  { ruleId: 'STRUCT-006', ruleName: 'Speaker Tag', pattern: /\([A-Za-z]+:\)/ },
  { ruleId: 'STRUCT-007', ruleName: 'Pipe Run', pattern: /\|+\s*\|+/ },
  { ruleId: 'STRUCT-008', ruleName: 'Separator Run', pattern: /={5,}/ },
  { ruleId: 'STRUCT-009', ruleName: 'Parenthesized Slashes', pattern: /\(\/+\)/ },
  { ruleId: 'STRUCT-010', ruleName: 'Parenthesized Asterisk', pattern: /\(\*\)/ },
]);

export const MARKER_RULE_ID = 'STRUCT-011';

/** Builds the `/TOKEN/` rule for a leaked internal marker. */
export function markerRule(token: string): PatternRule {
  const escaped = token.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
  return {
    ruleId: MARKER_RULE_ID,
    ruleName: 'Internal Marker',
    pattern: new RegExp(`/${escaped}/`),
  };
}

// A group holding a quantifier, itself followed by +, * or {n,m}
const NESTED_QUANTIFIER = /\((?:[^()\\]|\\.)*[+*}](?:[^()\\]|\\.)*\)[+*{]/;

/** True when a pattern source repeats a group that already repeats, e.g. `(a+)+`. */
export function hasNestedQuantifier(source: string): boolean {
  return NESTED_QUANTIFIER.test(source);
}

/**
 * Compiles user-supplied patterns into rules. Ids default to CUSTOM-001, CUSTOM-002, ...
 */
export function compileCustomRules(
  patterns: ReadonlyArray<{ id?: string; name: string; pattern: string }>,
): PatternRule[] {
  return patterns.map((p, i) => ({
    ruleId: p.id ?? `CUSTOM-${String(i + 1).padStart(3, '0')}`,
    ruleName: p.name,
    pattern: new RegExp(p.pattern),
  }));
}
