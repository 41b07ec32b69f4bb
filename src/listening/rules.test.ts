import { describe, it, expect } from 'vitest';
import { compileListeningRules, countCaptureGroups, listeningRulesFileSchema, loadListeningRules } from './rules.js';
import { LexiconError } from '../lexicon/errors.js';

describe('countCaptureGroups', () => {
  it('counts capturing groups only', () => {
    expect(countCaptureGroups(/a(b)(?:c)(d)?/)).toBe(2);
    expect(countCaptureGroups(/no groups/d)).toBe(0);
  });
});

describe('loadListeningRules', () => {
  const rules = loadListeningRules();

  it('expands grouped entries in file order', () => {
    const keys = rules.map((rule) => rule.key);
    expect(keys).toContain('because.1');
    expect(keys).toContain('longing.3');
    expect(keys.indexOf('because.1') + 1).toBe(keys.indexOf('because.2'));
  });

  it('derives specificity from capture groups', () => {
    const parent = rules.find((rule) => rule.key === 'parent');
    const grief = rules.find((rule) => rule.key === 'grief');
    expect(parent?.specificity).toBe(7);
    expect(grief?.specificity).toBe(6);
    expect(rules.every((rule) => rule.specificity >= rule.weight)).toBe(true);
  });

  it('compiles patterns with capture offsets', () => {
    expect(rules.every((rule) => rule.pattern.hasIndices && rule.pattern.ignoreCase)).toBe(true);
  });
});

describe('compileListeningRules', () => {
  const responses = [{ template: 'Okay.', requiresCapture: false }];

  it('caps the capture bonus at three', () => {
    const [rule] = compileListeningRules({ rules: [{ key: 'x', pattern: '(a)(b)(c)(d)', weight: 2, responses }] }, 'test');
    expect(rule?.specificity).toBe(5);
    expect(rule?.captureGroups).toBe(4);
  });

  it('throws LexiconError for an invalid pattern', () => {
    expect(() => compileListeningRules({ rules: [{ key: 'x', pattern: '(oops', weight: 1, responses }] }, 'test')).toThrow(
      LexiconError,
    );
  });

  it('rejects entries with both a pattern and a pattern group', () => {
    const result = listeningRulesFileSchema.safeParse({
      rules: [{ key: 'x', pattern: 'a', patterns: ['b'], weight: 1, responses }],
    });
    expect(result.success).toBe(false);
  });
});
