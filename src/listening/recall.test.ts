import { describe, it, expect } from 'vitest';
import { clipChars, isRecallDue, normalizeRecallLead, recallCarriers, recallSnippet } from './recall.js';

describe('recall', () => {
  it('prefixes temporal and possessive leads with "that"', () => {
    expect(normalizeRecallLead('Yesterday you had coffee')).toBe('that yesterday you had coffee');
    expect(normalizeRecallLead('We went out')).toBe('We went out');
  });

  it('builds a second-person snippet', () => {
    expect(recallSnippet('Yesterday I had coffee with an old neighbor', 'Hmm.', 0.45)).toBe(
      'that yesterday you had coffee with an old neighbor.',
    );
  });

  it('skips short snippets and snippets without a verb', () => {
    expect(recallSnippet('I was ok', 'Hmm.', 0.45)).toBeUndefined();
    expect(recallSnippet('Coffee with an old neighbor', 'Hmm.', 0.45)).toBeUndefined();
  });

  it('skips snippets that repeat the current input', () => {
    expect(recallSnippet('I had a long day at work', 'I had a long day at work today', 0.45)).toBeUndefined();
  });

  it('waits more than three steps between recalls', () => {
    expect(isRecallDue(5, undefined)).toBe(true);
    expect(isRecallDue(5, 2)).toBe(false);
    expect(isRecallDue(6, 2)).toBe(true);
  });

  it('clips and wraps snippets', () => {
    expect(clipChars('a'.repeat(130))).toHaveLength(120);
    expect(recallCarriers(['Earlier {snippet} Now?'], 'x.')).toEqual(['Earlier x. Now?']);
  });
});
