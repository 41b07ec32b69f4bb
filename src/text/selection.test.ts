import { describe, it, expect } from 'vitest';
import { graphemeLength, sliceSelection, effectiveText, SelectionRangeError } from './selection.js';

describe('graphemeLength', () => {
  it('counts an emoji as one position', () => {
    expect(graphemeLength('ok 😢')).toBe(4);
  });

  it('counts a flag sequence as one position', () => {
    expect(graphemeLength('🇳🇿!')).toBe(2);
  });
});

describe('sliceSelection', () => {
  const text = 'Today was long. I miss home 😢 a lot.';

  it('returns the half-open span', () => {
    expect(sliceSelection(text, { start: 16, end: 27 })).toBe('I miss home');
  });

  it('keeps an emoji whole', () => {
    expect(sliceSelection(text, { start: 28, end: 29 })).toBe('😢');
  });

  it('allows an empty span', () => {
    expect(sliceSelection(text, { start: 3, end: 3 })).toBe('');
  });

  it('rejects a span past the end', () => {
    expect(() => sliceSelection('abc', { start: 0, end: 4 })).toThrow(SelectionRangeError);
  });

  it('rejects a negative start', () => {
    expect(() => sliceSelection('abc', { start: -1, end: 2 })).toThrow(SelectionRangeError);
  });

  it('rejects a reversed span', () => {
    expect(() => sliceSelection('abc', { start: 2, end: 1 })).toThrow('Selection start 2 is after end 1');
  });

  it('rejects fractional bounds', () => {
    expect(() => sliceSelection('abc', { start: 0.5, end: 2 })).toThrow(SelectionRangeError);
  });

  it('reports the span and text length on the error', () => {
    try {
      sliceSelection('abc', { start: 1, end: 9 });
      expect.unreachable('sliceSelection should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(SelectionRangeError);
      if (err instanceof SelectionRangeError) {
        expect(err.span).toEqual({ start: 1, end: 9 });
        expect(err.length).toBe(3);
      }
    }
  });
});

describe('effectiveText', () => {
  it('returns the whole text without a selection', () => {
    expect(effectiveText('all of it')).toBe('all of it');
  });

  it('returns the selection when given', () => {
    expect(effectiveText('all of it', { start: 4, end: 6 })).toBe('of');
  });
});
