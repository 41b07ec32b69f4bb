export { EmotionClassifier, type EmotionResult, type EmotionClassifierOptions } from './classifier.js';
export {
  splitByContrast,
  windowEffect,
  negatedBefore,
  applyHit,
  applyAmplifiers,
  countCapsWords,
  topPositive,
  isMixed,
  CONTRAST_MARKERS,
  type ContrastSplit,
  type WindowEffect,
  type MixedOptions,
} from './modifiers.js';
export {
  Emotion,
  BASE_EMOTIONS,
  EMOTION_KEYS,
  EMOTION_ID_BY_KEY,
  EMOTION_INFO,
  NEGATIVE_EMOTIONS,
  emptyEmotionScores,
  isEmotionId,
  parseEmotion,
  emotionDisplay,
  type EmotionId,
  type BaseEmotionId,
  type EmotionKey,
  type EmotionScores,
} from './types.js';
