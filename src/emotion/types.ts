/**
 * Emotion identifiers, labels and score records.
 *
 * Ids are a closed set: 1..7 are scored directly, 8 (Mixed) is only ever
 * derived from the balance of the others.
 */

export const Emotion = {
  Joy: 1,
  Sadness: 2,
  Anger: 3,
  Fear: 4,
  Surprise: 5,
  Disgust: 6,
  Neutral: 7,
  Mixed: 8,
} as const;

export type EmotionId = (typeof Emotion)[keyof typeof Emotion];

/** Ids that accumulate scores; Mixed is excluded */
export type BaseEmotionId = Exclude<EmotionId, 8>;

export type EmotionKey = 'joy' | 'sadness' | 'anger' | 'fear' | 'surprise' | 'disgust' | 'neutral';

export type EmotionScores = Record<BaseEmotionId, number>;

export const BASE_EMOTIONS: readonly BaseEmotionId[] = [1, 2, 3, 4, 5, 6, 7];

export const EMOTION_KEYS = ['joy', 'sadness', 'anger', 'fear', 'surprise', 'disgust', 'neutral'] as const;

export const EMOTION_ID_BY_KEY: Record<EmotionKey, BaseEmotionId> = {
  joy: 1,
  sadness: 2,
  anger: 3,
  fear: 4,
  surprise: 5,
  disgust: 6,
  neutral: 7,
};

interface EmotionInfo {
  label: string;
  emoji: string;
  key: EmotionKey | 'mixed';
}

export const EMOTION_INFO: Record<EmotionId, EmotionInfo> = {
  1: { label: 'Joy', emoji: '🙂', key: 'joy' },
  2: { label: 'Sadness', emoji: '😢', key: 'sadness' },
  3: { label: 'Anger', emoji: '😠', key: 'anger' },
  4: { label: 'Fear', emoji: '😨', key: 'fear' },
  5: { label: 'Surprise', emoji: '😮', key: 'surprise' },
  6: { label: 'Disgust', emoji: '🤢', key: 'disgust' },
  7: { label: 'Neutral', emoji: '😐', key: 'neutral' },
  8: { label: 'Mixed', emoji: '😵‍💫', key: 'mixed' },
};

/** Negative emotions weighed against Joy when looking for a mixed entry */
export const NEGATIVE_EMOTIONS: readonly BaseEmotionId[] = [2, 3, 4, 6];

/** Names accepted for contextual emotion hints */
const EMOTION_ALIASES = new Map<string, EmotionId>([
  ['joy', 1],
  ['happy', 1],
  ['happiness', 1],
  ['glad', 1],
  ['sad', 2],
  ['sadness', 2],
  ['anger', 3],
  ['angry', 3],
  ['mad', 3],
  ['fear', 4],
  ['afraid', 4],
  ['scared', 4],
  ['anxiety', 4],
  ['anxious', 4],
  ['surprise', 5],
  ['surprised', 5],
  ['disgust', 6],
  ['disgusted', 6],
  ['neutral', 7],
  ['mixed', 8],
]);

export function emptyEmotionScores(): EmotionScores {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0, 7: 0 };
}

export function isEmotionId(value: number): value is EmotionId {
  return Number.isInteger(value) && value >= 1 && value <= 8;
}

/**
 * Resolve an id or a name/alias ("happy", "Anxious") to an emotion id.
 * Returns undefined when nothing matches.
 */
export function parseEmotion(value: number | string): EmotionId | undefined {
  if (typeof value === 'number') {
    return isEmotionId(value) ? value : undefined;
  }

  const trimmed = value.trim().toLowerCase();
  if (/^\d+$/.test(trimmed)) {
    return parseEmotion(Number(trimmed));
  }
  return EMOTION_ALIASES.get(trimmed);
}

/** "Joy 🙂" */
export function emotionDisplay(id: EmotionId): string {
  const info = EMOTION_INFO[id];
  return `${info.label} ${info.emoji}`;
}
