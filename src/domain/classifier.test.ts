import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { DomainClassifier } from './classifier.js';
import { LexiconStore } from '../lexicon/store.js';

const logger = pino({ level: 'silent' });
const store = new LexiconStore({ logger });

describe('DomainClassifier', () => {
  const classifier = new DomainClassifier({ logger, store });

  it('falls back to General/Other for empty text', () => {
    const result = classifier.classify('');
    expect(result.ranked).toEqual([]);
    expect(result.primary).toBe('General/Other');
    expect(result.scores['Work/Career']).toBe(0);
  });

  it('ranks Work/Career first for the work stress entry', () => {
    const result = classifier.classify(
      "I've been stressed about work deadlines and my manager keeps adding more projects.",
    );
    expect(result.primary).toBe('Work/Career');
    expect(result.ranked).toEqual([
      { domain: 'Work/Career', score: 4.6 },
      { domain: 'School/Learning', score: 1.15 },
    ]);
  });

  it('moves a workout to Exercise/Fitness and zeroes Work/Career', () => {
    const result = classifier.classify('I worked out at the gym before work');
    expect(result.ranked).toEqual([{ domain: 'Exercise/Fitness', score: 11.5 }]);
    expect(result.scores['Work/Career']).toBe(0);
  });

  it('zeroes Work/Career only in the sentence with the workout', () => {
    const result = classifier.classify('I worked late on the project. Then I worked out.');
    expect(result.primary).toBe('Exercise/Fitness');
    expect(result.scores['Exercise/Fitness']).toBeCloseTo(7.48, 1);
    expect(result.scores['Work/Career']).toBe(2);
  });

  it('biases toward Family when a kin term appears', () => {
    const result = classifier.classify('My mom and I talked about money');
    expect(result.ranked).toEqual([
      { domain: 'Family', score: 4.6 },
      { domain: 'Money/Finances', score: 1.15 },
    ]);
  });

  it('does not bias toward Family for spouse-only mentions', () => {
    const result = classifier.classify('My husband and I talked about money');
    expect(result.scores.Family).toBe(0);
    expect(result.ranked).toEqual([
      { domain: 'Relationships/Marriage/Partnership', score: 1.15 },
      { domain: 'Money/Finances', score: 1.15 },
    ]);
  });

  it('weights the newest sentence and keeps taxonomy order on ties', () => {
    const result = classifier.classify('I slept badly. Then I had coffee with my sister.');
    expect(result.ranked).toEqual([
      { domain: 'Family', score: 1.15 },
      { domain: 'Food/Eating', score: 1.15 },
      { domain: 'Sleep/Rest', score: 1 },
    ]);
  });

  it('adds phrase weight for regex phrases', () => {
    const result = classifier.classify('Paid off the loan. Feeling light.');
    // phrase 2.5 + "paid" + "loan", in the older sentence
    expect(result.ranked).toEqual([{ domain: 'Money/Finances', score: 4.5 }]);
  });

  it('drops scores under the reporting floor', () => {
    const strict = new DomainClassifier({ logger, store, minReportScore: 2 });
    const result = strict.classify('I had coffee');
    expect(result.ranked).toEqual([]);
    expect(result.primary).toBe('General/Other');
    expect(result.scores['Food/Eating']).toBe(1.15);
  });

  it('is deterministic', () => {
    const text = 'Went for a run, then brunch with friends. Work tomorrow.';
    expect(classifier.classify(text)).toEqual(classifier.classify(text));
  });
});
