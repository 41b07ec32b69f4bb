/**
 * Rule-based emotion classifier.
 *
 * Lexicon hits with a negation/intensity window, regex phrase bumps,
 * contrast weighting, whole-text amplifiers, a Neutral gate, and a Mixed
 * decision over the final scores. Deterministic and synchronous.
 */

import type { Logger } from 'pino';
import { getDefaultLexiconStore, type LexiconStore } from '../lexicon/store.js';
import { normalizeText, inLexicon } from '../text/segment.js';
import { silentLogger } from '../utils/logger.js';
import { applyAmplifiers, applyHit, isMixed, negatedBefore, splitByContrast, windowEffect } from './modifiers.js';
import {
  BASE_EMOTIONS,
  EMOTION_INFO,
  emptyEmotionScores,
  type BaseEmotionId,
  type EmotionId,
  type EmotionScores,
} from './types.js';

export interface EmotionResult {
  id: EmotionId;
  label: string;
  emoji: string;
  /** Raw scores for ids 1..7; Mixed has no score of its own */
  scores: EmotionScores;
}

export interface EmotionClassifierOptions {
  logger?: Logger;
  store?: LexiconStore;
  /** Relative gap under which the top two count as Mixed (default 0.30) */
  mixedMargin?: number;
  /** Weight of the clause after "but / however / though" (default 1.35) */
  contrastWeight?: number;
  /** Neutral anchor hits required before Neutral scores at all (default 2) */
  neutralMinHits?: number;
}

const SCORED_EMOTIONS: readonly BaseEmotionId[] = [1, 2, 3, 4, 5, 6];

export class EmotionClassifier {
  private logger: Logger;
  private store: LexiconStore;
  private mixedMargin: number;
  private contrastWeight: number;
  private neutralMinHits: number;

  constructor(options: EmotionClassifierOptions = {}) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'emotion' });
    this.store = options.store ?? getDefaultLexiconStore();
    this.mixedMargin = options.mixedMargin ?? 0.3;
    this.contrastWeight = options.contrastWeight ?? 1.35;
    this.neutralMinHits = options.neutralMinHits ?? 2;
  }

  classify(text: string): EmotionResult {
    if (!text.trim()) {
      const scores = emptyEmotionScores();
      scores[7] = 1;
      return this.result(7, scores);
    }

    const normalized = normalizeText(text);
    const { priority, others, contrasted } = splitByContrast(normalized);

    const scores = emptyEmotionScores();
    let neutralHits = 0;

    neutralHits += this.scoreClause(priority, scores, contrasted ? this.contrastWeight : 1);
    for (const clause of others) {
      neutralHits += this.scoreClause(clause, scores, 1);
    }

    applyAmplifiers(text, scores, this.store.emotion.emoji);

    if (neutralHits < this.neutralMinHits) {
      scores[7] = 0;
    }

    // Nothing positive left (empty, or only negated hits)
    if (BASE_EMOTIONS.every((id) => scores[id] <= 0)) {
      scores[7] = 1;
    }

    const id = this.decide(scores);
    this.logger.debug({ id, scores, contrasted, neutralHits }, 'Emotion classified');
    return this.result(id, scores);
  }

  /**
   * Score one clause into a fresh accumulator, then merge it weighted.
   * Returns the number of neutral anchor hits seen.
   */
  private scoreClause(clause: string, into: EmotionScores, weight: number): number {
    if (!clause) return 0;

    const lexicon = this.store.emotion;
    const local = emptyEmotionScores();
    let neutralHits = 0;

    const tokens = this.store.tokenize(clause);
    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (token === undefined) continue;

      const hits = SCORED_EMOTIONS.filter((id) => {
        const set = lexicon.terms.get(id);
        return set !== undefined && inLexicon(token, set);
      });

      const neutralSet = lexicon.terms.get(7);
      if (neutralSet && inLexicon(token, neutralSet)) {
        neutralHits++;
        local[7] += 1;
      }

      if (hits.length === 0) continue;

      const effect = windowEffect(tokens, i, lexicon);
      for (const id of hits) {
        applyHit(local, id, effect);
      }
    }

    // Phrase closures run last so a zeroed category stays zero for the clause
    for (const phrase of lexicon.phrases) {
      const match = phrase.pattern.exec(clause);
      if (match && !negatedBefore(this.store.tokenize(clause.slice(0, match.index)), lexicon)) {
        phrase.apply(local);
      }
    }

    for (const id of BASE_EMOTIONS) {
      into[id] += local[id] * weight;
    }

    return neutralHits;
  }

  private decide(scores: EmotionScores): EmotionId {
    if (isMixed(scores, { mixedMargin: this.mixedMargin })) return 8;

    let top: BaseEmotionId = 7;
    let best = -Infinity;
    for (const id of BASE_EMOTIONS) {
      if (scores[id] > best) {
        best = scores[id];
        top = id;
      }
    }
    return top;
  }

  private result(id: EmotionId, scores: EmotionScores): EmotionResult {
    const info = EMOTION_INFO[id];
    return { id, label: info.label, emoji: info.emoji, scores };
  }
}
