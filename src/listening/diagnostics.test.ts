import { describe, it, expect } from 'vitest';
import { evaluateResponses } from './diagnostics.js';

describe('evaluateResponses', () => {
  it('counts grammar, punctuation and capitalization issues', () => {
    expect(evaluateResponses(['You was there..', 'i think so', 'The the end!?', 'He said "hi.'])).toEqual({
      grammar: 2,
      punctuation: 4,
      capitalization: 2,
    });
  });

  it('finds nothing in a clean response', () => {
    expect(evaluateResponses(["It's okay not to know what to do anymore. That's part of it."])).toEqual({
      grammar: 0,
      punctuation: 0,
      capitalization: 0,
    });
  });

  it('returns zeros for an empty list', () => {
    expect(evaluateResponses([])).toEqual({ grammar: 0, punctuation: 0, capitalization: 0 });
  });
});
