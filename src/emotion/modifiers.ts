/**
 * Signal modifiers for the emotion classifier.
 *
 * Contrast splitting, the negation/intensity window around a lexicon hit,
 * and whole-text amplifiers (emoji, exclamation marks, question marks,
 * ALL-CAPS words). Pure functions over plain score records.
 */

import type { EmotionLexicon } from '../lexicon/types.js';
import { BASE_EMOTIONS, NEGATIVE_EMOTIONS, type BaseEmotionId, type EmotionScores } from './types.js';

// ============ Constants ============

/** Tokens either side of a hit searched for negators and intensity words */
export const NEGATION_WINDOW = 3;
export const INTENSIFIER_MULTIPLIER = 1.6;
export const DAMPENER_MULTIPLIER = 0.7;
/** Share of an inverted Joy hit moved into Sadness ("not happy") */
export const NEGATED_JOY_TO_SADNESS = 0.8;

export const EXCLAMATION_BOOST = 0.12;
export const QUESTION_SURPRISE_BOOST = 0.5;
export const CAPS_BOOST = 0.15;
export const EMOJI_BOOST = 1.0;

export const CONTRAST_MARKERS = [' but ', ' however ', ' though '] as const;

// ============ Contrast ============

export interface ContrastSplit {
  /** Clause after the first contrast marker, or the whole text */
  priority: string;
  /** Clause before the marker, if any */
  others: string[];
  contrasted: boolean;
}

/**
 * Split on the first contrast marker found (markers tried in order).
 * Input is expected to be normalized (lowercase).
 */
export function splitByContrast(text: string): ContrastSplit {
  for (const marker of CONTRAST_MARKERS) {
    const index = text.indexOf(marker);
    if (index >= 0) {
      const before = text.slice(0, index).trim();
      const after = text.slice(index + marker.length).trim();
      return { priority: after, others: before ? [before] : [], contrasted: true };
    }
  }
  return { priority: text, others: [], contrasted: false };
}

// ============ Window ============

export interface WindowEffect {
  multiplier: number;
  negated: boolean;
}

/**
 * Look ±NEGATION_WINDOW tokens around `index` (excluding the hit itself).
 * Intensifiers and dampeners compound; any negator inverts.
 */
export function windowEffect(
  tokens: readonly string[],
  index: number,
  lexicon: Pick<EmotionLexicon, 'intensifiers' | 'dampeners' | 'negators'>,
  window: number = NEGATION_WINDOW,
): WindowEffect {
  let multiplier = 1;
  let negated = false;

  const lo = Math.max(0, index - window);
  const hi = Math.min(tokens.length - 1, index + window);

  for (let j = lo; j <= hi; j++) {
    if (j === index) continue;
    const ctx = tokens[j];
    if (ctx === undefined) continue;
    if (lexicon.intensifiers.has(ctx)) multiplier *= INTENSIFIER_MULTIPLIER;
    if (lexicon.dampeners.has(ctx)) multiplier *= DAMPENER_MULTIPLIER;
    if (lexicon.negators.has(ctx)) negated = true;
  }

  return { multiplier, negated };
}

/**
 * True when a negator sits among the last `window` tokens before a phrase
 * match ("not angry", "never disgusted").
 */
export function negatedBefore(
  precedingTokens: readonly string[],
  lexicon: Pick<EmotionLexicon, 'negators'>,
  window: number = NEGATION_WINDOW,
): boolean {
  return precedingTokens.slice(-window).some((token) => lexicon.negators.has(token));
}

/**
 * Apply one lexicon hit to a score record, redirecting an inverted Joy
 * hit partly into Sadness.
 */
export function applyHit(scores: EmotionScores, emotion: BaseEmotionId, effect: WindowEffect): void {
  const value = (effect.negated ? -1 : 1) * effect.multiplier;
  scores[emotion] += value;
  if (effect.negated && emotion === 1) {
    scores[2] += Math.abs(value) * NEGATED_JOY_TO_SADNESS;
  }
}

// ============ Amplifiers ============

/**
 * Highest positive-scoring emotion, ties broken by lower id.
 * Undefined when nothing has scored above zero.
 */
export function topPositive(scores: EmotionScores): BaseEmotionId | undefined {
  let best: BaseEmotionId | undefined;
  for (const id of BASE_EMOTIONS) {
    if (scores[id] > 0 && (best === undefined || scores[id] > scores[best])) {
      best = id;
    }
  }
  return best;
}

/**
 * Words written entirely in capitals (letters only, 3+ long), skipping URLs.
 */
export function countCapsWords(rawText: string): number {
  let count = 0;
  for (const chunk of rawText.split(/\s+/)) {
    if (/^(?:https?:\/\/|www\.)/i.test(chunk)) continue;
    const word = chunk.replace(/^[^\p{L}]+|[^\p{L}]+$/gu, '');
    if (/^\p{Lu}{3,}$/u.test(word)) count++;
  }
  return count;
}

/**
 * Whole-text amplifiers, applied after clause scoring.
 * Emoji first, then `!`, then `??`, then ALL-CAPS words.
 */
export function applyAmplifiers(
  rawText: string,
  scores: EmotionScores,
  emoji: ReadonlyMap<string, BaseEmotionId>,
): void {
  for (const ch of rawText) {
    const id = emoji.get(ch);
    if (id !== undefined) scores[id] += EMOJI_BOOST;
  }

  const bangs = countChar(rawText, '!');
  if (bangs > 0) {
    const target = scores[1] > 0 ? 1 : scores[5] > 0 ? 5 : topPositive(scores);
    if (target !== undefined) {
      scores[target] += bangs * EXCLAMATION_BOOST * Math.max(1, scores[target]);
    }
  }

  if (countChar(rawText, '?') >= 2) {
    scores[5] += QUESTION_SURPRISE_BOOST;
  }

  const caps = countCapsWords(rawText);
  for (let i = 0; i < caps; i++) {
    const target = topPositive(scores);
    if (target === undefined) break;
    scores[target] += CAPS_BOOST;
  }
}

function countChar(text: string, ch: string): number {
  let count = 0;
  for (const c of text) if (c === ch) count++;
  return count;
}

// ============ Mixed ============

export interface MixedOptions {
  mixedMargin: number;
  /** Both Joy and the strongest negative must reach this */
  oppositionFloor?: number;
  /** min/max of the two must reach this */
  oppositionRatio?: number;
}

export const OPPOSITION_FLOOR = 1.5;
export const OPPOSITION_RATIO = 0.6;

/**
 * True when the top two scores are too close to call, or when Joy and a
 * negative emotion are both strong and comparable.
 */
export function isMixed(scores: EmotionScores, options: MixedOptions): boolean {
  const ranked = [...BASE_EMOTIONS].sort((a, b) => scores[b] - scores[a] || a - b);
  const top = scores[ranked[0] ?? 7];
  const second = scores[ranked[1] ?? 7];

  if (second > 0 && (top - second) / Math.max(1, top) < options.mixedMargin) {
    return true;
  }

  const floor = options.oppositionFloor ?? OPPOSITION_FLOOR;
  const ratio = options.oppositionRatio ?? OPPOSITION_RATIO;
  const joy = scores[1];
  const negative = Math.max(...NEGATIVE_EMOTIONS.map((id) => scores[id]));

  return joy >= floor && negative >= floor && Math.min(joy, negative) / Math.max(joy, negative) >= ratio;
}
