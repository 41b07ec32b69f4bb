import { z } from 'zod';
import { EMOTION_KEYS } from '../emotion/types.js';
import { DOMAINS } from '../domain/taxonomy.js';

const wordListSchema = z.array(z.string().min(1));
const patternListSchema = z.array(z.string().min(1));

const emotionKeySchema = z.enum(EMOTION_KEYS);
const domainNameSchema = z.enum(DOMAINS);

// ============ Emotion ============

const emotionPhraseSchema = z.object({
  pattern: z.string().min(1),
  add: z.record(emotionKeySchema, z.number()),
  zero: z.array(emotionKeySchema).default([]),
});

const emotionWordListsSchema = z.object({
  joy: wordListSchema,
  sadness: wordListSchema,
  anger: wordListSchema,
  fear: wordListSchema,
  surprise: wordListSchema,
  disgust: wordListSchema,
  neutral: wordListSchema,
});

export const emotionLexiconFileSchema = z.object({
  lexicons: emotionWordListsSchema,
  intensifiers: wordListSchema,
  dampeners: wordListSchema,
  negators: wordListSchema,
  phrases: z.array(emotionPhraseSchema),
  emoji: z.record(z.string().min(1), emotionKeySchema),
});

/** Additive overlay: any subset of the word lists */
export const emotionOverlaySchema = emotionWordListsSchema.partial().extend({
  intensifiers: wordListSchema.optional(),
  dampeners: wordListSchema.optional(),
  negators: wordListSchema.optional(),
});

// ============ Domain ============

const domainOverrideSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  add: z.record(domainNameSchema, z.number()),
  zero: z.array(domainNameSchema).default([]),
});

export const domainLexiconFileSchema = z.object({
  keywords: z.record(domainNameSchema, wordListSchema),
  phrases: z.record(domainNameSchema, patternListSchema),
  overrides: z.array(domainOverrideSchema),
  kinTerms: wordListSchema,
  spouseTerms: wordListSchema,
});

/** Additive overlay keyed by taxonomy name; unknown names fail validation */
export const domainOverlaySchema = z.object({
  domains: z.record(domainNameSchema, wordListSchema).optional(),
  phrases: z.record(domainNameSchema, patternListSchema).optional(),
});

export type EmotionLexiconFile = z.infer<typeof emotionLexiconFileSchema>;
export type EmotionLexiconOverlay = z.infer<typeof emotionOverlaySchema>;
export type DomainLexiconFile = z.infer<typeof domainLexiconFileSchema>;
export type DomainLexiconOverlay = z.infer<typeof domainOverlaySchema>;
