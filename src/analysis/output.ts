import type { DomainResult } from '../domain/classifier.js';
import type { DomainHint } from '../domain/taxonomy.js';
import type { EmotionResult } from '../emotion/classifier.js';
import { BASE_EMOTIONS, EMOTION_INFO, emotionDisplay, type EmotionId } from '../emotion/types.js';

export interface RankedScore {
  key: string;
  score: number;
}

/** Common shape for both classifiers */
export interface ClassificationOutput {
  /** Display label, e.g. "Fear 😨" or "Work/Career" */
  categoryLabel: string;
  /** Emotion id; absent for domains */
  numericId?: EmotionId;
  rankedScores: RankedScore[];
  /** Plain label of the winning category */
  primary: string;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Emotion scores ranked highest first, ties by lower id.
 */
export function toEmotionOutput(result: EmotionResult): ClassificationOutput {
  const rankedScores = [...BASE_EMOTIONS]
    .sort((a, b) => result.scores[b] - result.scores[a] || a - b)
    .map((id) => ({ key: EMOTION_INFO[id].label, score: round2(result.scores[id]) }));

  return {
    categoryLabel: emotionDisplay(result.id),
    numericId: result.id,
    rankedScores,
    primary: result.label,
  };
}

export function toDomainOutput(result: DomainResult): ClassificationOutput {
  return {
    categoryLabel: result.primary,
    rankedScores: result.ranked.map(({ domain, score }) => ({ key: domain, score })),
    primary: result.primary,
  };
}

/**
 * Ranked domains as share-of-total confidences for the listening engine.
 */
export function domainHintsFrom(result: DomainResult): DomainHint[] {
  const total = result.ranked.reduce((sum, { score }) => sum + score, 0);
  if (total <= 0) return [];
  return result.ranked.map(({ domain, score }) => ({ domain, confidence: score / total }));
}
