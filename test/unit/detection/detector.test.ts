import { describe, it, expect } from 'vitest';
import { CorruptionDetector } from '../../../src/detection/detector.js';

const detector = new CorruptionDetector();

describe('CorruptionDetector', () => {
  describe('evaluate', () => {
    it('accepts a clean conversational reply', () => {
      expect(detector.evaluate('I am happy to help. What would you like to discuss today?')).toBe(false);
    });

    it('accepts a multi-line reply', () => {
      const text = 'I have been thinking about how memory shapes identity.\n\n' +
        'Would you like to explore that together, or talk about something else?';
      expect(detector.evaluate(text)).toBe(false);
    });

    it('accepts the empty string', () => {
      expect(detector.evaluate('')).toBe(false);
    });

    it('accepts whitespace only', () => {
      expect(detector.evaluate('  \n\t  ')).toBe(false);
    });

    it('flags a fenced code block', () => {
      expect(detector.evaluate('Hello! ```code block``` more text')).toBe(true);
    });

    it('flags a speaker tag', () => {
      expect(detector.evaluate('(Lira:) Hi there!')).toBe(true);
    });

    it('flags a separator run', () => {
      expect(detector.evaluate('===== SECTION =====')).toBe(true);
    });

    it('accepts an enumeration inside ordinary prose', () => {
      expect(detector.evaluate('Choose one of a) b) c) d) and tell me why.')).toBe(false);
    });

    it('flags a bare enumeration on density alone', () => {
      const report = detector.inspect('a) b) c) d)');
      expect(report.corrupted).toBe(true);
      expect(report.detections.map(d => d.ruleId)).toEqual(['COMP-001']);
    });

    it('flags the internal marker surrounded by clean text', () => {
      expect(detector.evaluate('Sure, here you go. /LIRA/ Have a great day.')).toBe(true);
    });

    it('accepts a degree sign in a weather report', () => {
      expect(detector.evaluate('The forecast says 75°F and sunny.')).toBe(false);
    });

    it('accepts snake_case identifiers in a reply', () => {
      expect(detector.evaluate('my_var_x_y')).toBe(false);
      expect(detector.inspect('Rename it to user_id or user_name.').compositionRatio).toBe(1 / 34);
    });

    it('is deterministic', () => {
      const text = 'Hey! What is up? :) {thinking}';
      const first = detector.evaluate(text);
      for (let i = 0; i < 5; i++) {
        expect(detector.evaluate(text)).toBe(first);
      }
    });

    it('stays corrupted when another corrupting pattern is appended', () => {
      const t1 = '(Lira:) Hi there!';
      expect(detector.evaluate(t1)).toBe(true);
      expect(detector.evaluate(t1 + ' =====')).toBe(true);
      expect(detector.evaluate(t1 + ' <tag>')).toBe(true);
    });

    it('turns a clean reply corrupted when a pattern is appended', () => {
      const clean = 'Thanks for asking, I am doing well today.';
      expect(detector.evaluate(clean)).toBe(false);
      expect(detector.evaluate(clean + ' (*)')).toBe(true);
    });

    it('applies the ratio threshold strictly', () => {
      expect(detector.evaluate('a'.repeat(7500) + '!'.repeat(2500))).toBe(false);
      expect(detector.evaluate('a'.repeat(7499) + '!'.repeat(2501))).toBe(true);
    });
  });

  describe('evaluateBatch', () => {
    it('evaluates each sample in order', () => {
      expect(detector.evaluateBatch(['fine text', '=====', ''])).toEqual([false, true, false]);
    });
  });

  describe('inspect', () => {
    it('reports an empty sample as acceptable', () => {
      expect(detector.inspect('')).toEqual({
        corrupted: false,
        length: 0,
        compositionRatio: 0,
        detections: [],
      });
    });

    it('reports every rule that fires, structural first', () => {
      const report = detector.inspect('(Lira:) ===== hi');
      expect(report.corrupted).toBe(true);
      expect(report.length).toBe(16);
      expect(report.compositionRatio).toBe(0.5);
      expect(report.detections.map(d => d.ruleId)).toEqual(['STRUCT-006', 'STRUCT-008', 'COMP-001']);
    });

    it('agrees with evaluate', () => {
      const samples = [
        '',
        'Plain words only',
        '<lira> What is on your mind? </lira>',
        '/usr/local/bin/lira',
        'Hey! :) ... ?!',
        'a || b',
      ];
      for (const sample of samples) {
        expect(detector.inspect(sample).corrupted).toBe(detector.evaluate(sample));
      }
    });
  });

  describe('options', () => {
    it('lists the built-in rules in evaluation order', () => {
      expect(detector.ruleIds).toEqual([
        'STRUCT-001', 'STRUCT-002', 'STRUCT-003', 'STRUCT-004', 'STRUCT-005', 'STRUCT-006',
        'STRUCT-007', 'STRUCT-008', 'STRUCT-009', 'STRUCT-010', 'STRUCT-011',
      ]);
    });

    it('uses a custom composition threshold', () => {
      expect(detector.evaluate('ab!')).toBe(true);
      expect(new CorruptionDetector({ compositionThreshold: 0.5 }).evaluate('ab!')).toBe(false);
    });

    it('rejects a threshold outside [0, 1]', () => {
      expect(() => new CorruptionDetector({ compositionThreshold: 1.5 })).toThrow(RangeError);
      expect(() => new CorruptionDetector({ compositionThreshold: Number.NaN })).toThrow(RangeError);
    });

    it('uses a custom marker token', () => {
      const text = 'Reply /GPT4/ ends here';
      expect(detector.evaluate(text)).toBe(false);

      const custom = new CorruptionDetector({ markerToken: 'GPT4' });
      expect(custom.inspect(text).detections.map(d => d.ruleId)).toEqual(['STRUCT-011']);
    });

    it('drops the marker rule when the token is null', () => {
      const custom = new CorruptionDetector({ markerToken: null });
      expect(custom.ruleIds).not.toContain('STRUCT-011');
      expect(custom.ruleIds).toHaveLength(10);
    });

    it('checks extra rules after the built-in catalogue', () => {
      const text = 'Hello there, friend <|eot|> and more words here to dilute';
      expect(detector.evaluate(text)).toBe(false);

      const custom = new CorruptionDetector({
        extraRules: [{ ruleId: 'CUSTOM-001', ruleName: 'End Token', pattern: /<\|eot\|>/ }],
      });
      expect(custom.ruleIds.at(-1)).toBe('CUSTOM-001');
      expect(custom.evaluate(text)).toBe(true);
      expect(custom.inspect(text).detections.map(d => d.ruleId)).toEqual(['CUSTOM-001']);
    });
  });

  describe('matching time', () => {
    // Near-misses that make a backtracking engine retry each rule at every offset
    const cases: Array<[string, string, boolean]> = [
      ['slash without a closing slash', '/' + 'a'.repeat(1_000_000), false],
      ['fence without a closing fence', '```' + 'a'.repeat(1_000_000), true],
      ['open parentheses never closed', '(a'.repeat(500_000), true],
      ['angle brackets never closed', '<a'.repeat(500_000), true],
      ['pipe followed by a long whitespace run', '|' + ' '.repeat(1_000_000) + 'x', false],
      ['equals runs one short of a separator', '====a'.repeat(250_000), true],
      ['letters ending in a lone slash', 'a'.repeat(1_000_000) + '/', false],
    ];

    it.each(cases)('inspects %s within a bounded time', (_label, text, corrupted) => {
      const start = performance.now();
      const report = detector.inspect(text);
      const verdict = detector.evaluate(text);
      const elapsed = performance.now() - start;

      expect(report.corrupted).toBe(corrupted);
      expect(verdict).toBe(corrupted);
      expect(elapsed).toBeLessThan(5_000);
    }, 30_000);
  });
});
