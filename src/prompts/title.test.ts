import { describe, it, expect } from 'vitest';
import { suggestTitle } from './title.js';

describe('suggestTitle', () => {
  it('uses the first sentence without its period', () => {
    expect(suggestTitle('Long day at work. Then dinner.')).toBe('Long day at work');
  });

  it('keeps other terminal marks', () => {
    expect(suggestTitle('Wow! That happened.')).toBe('Wow!');
  });

  it('cuts long sentences at a word boundary', () => {
    expect(suggestTitle('word '.repeat(30))).toBe('word '.repeat(16).trim());
  });

  it('hard-cuts when there is no usable space', () => {
    expect(suggestTitle('a'.repeat(100))).toBe('a'.repeat(80));
  });

  it('returns an empty title for empty text', () => {
    expect(suggestTitle('   ')).toBe('');
  });
});
