import { describe, it, expect, beforeEach } from 'vitest';
import { pino } from 'pino';
import { JournalAnalyzer } from './journal-analyzer.js';
import { HintError, InputError, resolveInput } from './input.js';
import { SelectionRangeError } from '../text/selection.js';
import { LexiconStore } from '../lexicon/store.js';

const logger = pino({ level: 'silent' });
const store = new LexiconStore({ logger });

const WORK_ENTRY = "I've been stressed about work deadlines and my manager keeps adding more projects.";

describe('JournalAnalyzer', () => {
  let analyzer: JournalAnalyzer;

  beforeEach(() => {
    analyzer = new JournalAnalyzer({ logger, store });
  });

  describe('analyze', () => {
    it('reports on a work-stress entry', () => {
      const report = analyzer.analyze(WORK_ENTRY);

      expect(report.emotion.numericId).toBe(4);
      expect(report.emotion.categoryLabel).toBe('Fear 😨');
      expect(report.domain.rankedScores).toEqual([
        { key: 'Work/Career', score: 4.6 },
        { key: 'School/Learning', score: 1.15 },
      ]);
      expect(report.topDomain).toContain('Work');
      expect(report.response).toBe(
        "Stress about work deadlines and your manager keeps adding more projects can pile up. What's weighing on you most right now?",
      );
      expect(report.stage).toBe('rule');
      expect(report.prompt).toBe(
        "What about work feels uncertain right now, and what's one thing within your control?",
      );
      expect(report.title).toBe("I've been stressed about work deadlines and my manager keeps adding more");
      expect(report.repetitionHint).toBeUndefined();
    });

    it('handles empty text without a response', () => {
      const report = analyzer.analyze('   ');

      expect(report.emotion.primary).toBe('Neutral');
      expect(report.domain.primary).toBe('General/Other');
      expect(report.response).toBeUndefined();
      expect(report.prompt).toBe('Pick one sentence to expand with sensory detail.');
      expect(report.title).toBe('');
    });
  });

  describe('classifiers', () => {
    it('ranks emotion scores with Neutral on empty text', () => {
      const output = analyzer.classifyEmotion('');
      expect(output.numericId).toBe(7);
      expect(output.rankedScores[0]).toEqual({ key: 'Neutral', score: 1 });
      expect(output.rankedScores.map((s) => s.key)).toEqual([
        'Neutral',
        'Joy',
        'Sadness',
        'Anger',
        'Fear',
        'Surprise',
        'Disgust',
      ]);
    });

    it('classifies only the selected graphemes', () => {
      const output = analyzer.classifyDomain({
        text: 'I had coffee. Paid off the loan.',
        selection: { start: 0, end: 12 },
      });
      expect(output.rankedScores).toEqual([{ key: 'Food/Eating', score: 1.15 }]);
      expect(output.numericId).toBeUndefined();
    });
  });

  describe('contextual hints', () => {
    it('uses an emotion hint given by name', () => {
      expect(analyzer.respond({ text: 'Hmm.', contextualEmotion: 'anxious' })).toBe(
        "You're safe to say anything here.",
      );
    });

    it('uses a confident domain hint', () => {
      expect(
        analyzer.respond({ text: 'Hmm.', contextualDomains: [{ domain: 'Sleep/Rest', confidence: 0.8 }] }),
      ).toBe('Rest matters. How has your energy been?');
    });

    it('rejects an unknown emotion', () => {
      expect(() => analyzer.respond({ text: 'Hmm.', contextualEmotion: 'elated-ish' })).toThrow(HintError);
    });

    it('rejects an unknown domain', () => {
      expect(() =>
        analyzer.respond({ text: 'Hmm.', contextualDomains: [{ domain: 'Gardening', confidence: 0.5 }] }),
      ).toThrow(HintError);
    });

    it('rejects a confidence above 1', () => {
      expect(() =>
        analyzer.respond({ text: 'Hmm.', contextualDomains: [{ domain: 'Family', confidence: 1.5 }] }),
      ).toThrow(/between 0 and 1/);
    });
  });

  describe('input validation', () => {
    it('rejects a reversed selection', () => {
      expect(() => analyzer.classifyEmotion({ text: 'hello', selection: { start: 3, end: 1 } })).toThrow(
        SelectionRangeError,
      );
    });

    it('rejects malformed input', () => {
      expect(() => resolveInput({ body: 'hello' })).toThrow(InputError);
    });
  });

  describe('session', () => {
    it('resets the engine history', () => {
      analyzer.respond('Hmm.');
      expect(analyzer.snapshot().stepCounter).toBe(1);

      analyzer.resetSession();
      expect(analyzer.snapshot()).toMatchObject({ stepCounter: 0, memory: [], recentFamilyHistory: [] });
    });
  });
});
