import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { EmotionClassifier } from './classifier.js';
import { LexiconStore } from '../lexicon/store.js';

const logger = pino({ level: 'silent' });
const store = new LexiconStore({ logger });

describe('EmotionClassifier', () => {
  const classifier = new EmotionClassifier({ logger, store });

  it('returns Neutral with score 1 for empty text', () => {
    const result = classifier.classify('   ');
    expect(result.id).toBe(7);
    expect(result.label).toBe('Neutral');
    expect(result.scores).toEqual({ 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0, 7: 1 });
  });

  it('redirects negated joy into sadness', () => {
    const result = classifier.classify('I am not happy');
    expect(result.id).toBe(2);
    expect(result.scores[1]).toBe(-1);
    expect(result.scores[2]).toBeCloseTo(0.8);
  });

  it('falls back to Neutral when the only hit is negated', () => {
    const result = classifier.classify('I am not sad');
    expect(result.id).toBe(7);
    expect(result.scores[1]).toBe(0);
    expect(result.scores[2]).toBe(-1);
    expect(result.scores[7]).toBe(1);
  });

  it('skips phrase bumps that follow a negator', () => {
    const angry = classifier.classify("I'm not angry");
    expect(angry.id).toBe(7);
    expect(angry.scores[3]).toBe(-1);

    const disgusted = classifier.classify('Never disgusted');
    expect(disgusted.id).toBe(7);
    expect(disgusted.scores[6]).toBe(-1);
  });

  it('compounds intensifiers, phrase bumps and exclamation marks', () => {
    const result = classifier.classify("I'm really very angry about this!");
    expect(result.id).toBe(3);
    expect(result.scores[3]).toBeCloseTo(6.2272);
  });

  it('dampens hits next to softening phrases', () => {
    const result = classifier.classify("I'm kind of sad");
    expect(result.id).toBe(2);
    expect(result.scores[2]).toBeCloseTo(0.7);
  });

  it('matches lexicon words through their light stem', () => {
    expect(classifier.classify("I've been worrying a lot").id).toBe(4);
  });

  it('weights the clause after a contrast marker', () => {
    expect(classifier.classify('The day was okay but I feel sad').scores[2]).toBeCloseTo(1.35);

    const flat = new EmotionClassifier({ logger, store, contrastWeight: 1 });
    expect(flat.classify('The day was okay but I feel sad').scores[2]).toBeCloseTo(1);
  });

  it('reports Mixed for balanced opposing cues', () => {
    const result = classifier.classify("I'm so grateful but also furious about this");
    expect(result.id).toBe(8);
    expect(result.label).toBe('Mixed');
    expect(result.scores[1]).toBeCloseTo(4.1);
    expect(result.scores[3]).toBeCloseTo(5.4);
  });

  it('respects a tighter mixed margin', () => {
    const strict = new EmotionClassifier({ logger, store, mixedMargin: 0.1 });
    // joy 4.1 against anger 5.4 is still Mixed through the opposition check
    expect(strict.classify("I'm so grateful but also furious about this").id).toBe(8);
    expect(strict.classify('The day was okay but I feel sad').id).toBe(2);
  });

  it('lets a phrase zero a competing emotion', () => {
    const result = classifier.classify('Happy tears today, I cried at the wedding');
    expect(result.id).toBe(1);
    expect(result.scores[1]).toBeCloseTo(3.5);
    expect(result.scores[2]).toBe(0);
  });

  it('counts Neutral only with enough anchor words', () => {
    const anchored = classifier.classify('Today I noticed the weather.');
    expect(anchored.id).toBe(7);
    expect(anchored.scores[7]).toBe(3);

    const single = classifier.classify('Today was fine');
    expect(single.id).toBe(7);
    expect(single.scores[7]).toBe(1);
  });

  it('uses emoji as signals', () => {
    expect(classifier.classify('Long day 😭').id).toBe(2);
  });

  it('classifies the work stress entry as Fear', () => {
    const result = classifier.classify(
      "I've been stressed about work deadlines and my manager keeps adding more projects.",
    );
    expect(result.id).toBe(4);
    expect(result.scores[4]).toBe(1);
  });

  it('is deterministic', () => {
    const text = 'Wow, I did not expect that!! Kind of thrilled, kind of scared.';
    expect(classifier.classify(text)).toEqual(classifier.classify(text));
  });
});
