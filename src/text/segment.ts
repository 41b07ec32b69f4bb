/**
 * Text segmentation and tokenization shared by every classifier.
 *
 * Sentences split on `. ! ? \n`; tokens are lowercase runs of letters,
 * digits and underscores. Multi-word idioms are joined with `_` before
 * splitting so lexicon entries like "out of nowhere" match one token.
 */

// ============ Types ============

/** A multi-word expression rewritten to a single token before splitting */
export interface Idiom {
  pattern: RegExp;
  replacement: string;
}

// ============ Constants ============

const SENTENCE_BREAKERS = new Set(['.', '!', '?', '\n']);

const TOKEN_SPLIT_RE = /[^\p{L}\p{N}_]+/u;

/** Suffixes tried in order; the first one that leaves a 3+ char stem wins */
const STEM_SUFFIXES = ['ing', 'ed', 'ly', 'ies', 's'] as const;

const MIN_STEM_LENGTH = 3;

/** Words whose stems would collide with unrelated lexicon entries */
export const STEM_EXCEPTIONS: ReadonlySet<string> = new Set([
  'made',
  'news',
  'this',
  'less',
  'boss',
  'miss',
  'bless',
  'stress',
  'class',
  'glass',
  'always',
  'series',
  'during',
  'morning',
  'evening',
  'nothing',
  'something',
  'anything',
  'everything',
  'thing',
  'bring',
  'king',
  'ring',
  'sing',
  'spring',
  'only',
  'early',
  'family',
  'reply',
  'bed',
  'red',
  'need',
  'feed',
  'seed',
]);

/** Built-in idioms joined regardless of what the lexicons contain */
const BUILT_IN_IDIOM_PHRASES = [
  'out of nowhere',
  'credit card',
  'social media',
  'date night',
  'made up',
  'time block',
  'game night',
  'movie night',
  'road trip',
  'board game',
];

/** "work out", "workout", "worked out", "working out" all become one token */
const WORKOUT_IDIOM: Idiom = {
  pattern: /(?<![\p{L}\p{N}_])work(?:s|ed|ing)?[\s-]+outs?(?![\p{L}\p{N}_])/gu,
  replacement: 'workout',
};

// ============ Normalization ============

/**
 * Lowercase, straighten curly quotes, and collapse whitespace.
 * Emoji and punctuation are kept.
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Normalize a lexicon entry to the token form the tokenizer produces:
 * "Can't stand" → "cant_stand", "check-in" → "check_in".
 */
export function normalizeEntry(entry: string): string {
  return entry
    .toLowerCase()
    .replace(/['‘’]/g, '')
    .split(TOKEN_SPLIT_RE)
    .filter((part) => part.length > 0)
    .join('_');
}

/**
 * Build the idiom rewrite for a normalized multi-word entry.
 * Returns undefined for single-word entries.
 */
export function compileIdiom(entry: string): Idiom | undefined {
  const normalized = normalizeEntry(entry);
  const words = normalized.split('_');
  if (words.length < 2) return undefined;

  const body = words.map(escapeRegExp).join('[^\\p{L}\\p{N}]+');
  return {
    pattern: new RegExp(`(?<![\\p{L}\\p{N}_])${body}(?![\\p{L}\\p{N}_])`, 'gu'),
    replacement: normalized,
  };
}

/**
 * Compile idioms for a set of entries, longest first so that
 * "proper chuffed" is joined before a shorter overlapping phrase.
 */
export function compileIdioms(entries: Iterable<string>): Idiom[] {
  const unique = new Map<string, Idiom>();
  for (const entry of entries) {
    const idiom = compileIdiom(entry);
    if (idiom) unique.set(idiom.replacement, idiom);
  }

  const sorted = [...unique.values()].sort(
    (a, b) => b.replacement.split('_').length - a.replacement.split('_').length,
  );
  return [WORKOUT_IDIOM, ...sorted];
}

/** Idioms used when the caller has no lexicon store at hand */
export const DEFAULT_IDIOMS: readonly Idiom[] = compileIdioms(BUILT_IN_IDIOM_PHRASES);

// ============ Sentences ============

/**
 * Split text into trimmed, non-empty sentences.
 * The boundary character stays with the sentence it ends.
 */
export function splitSentences(text: string): string[] {
  const parts: string[] = [];
  let current = '';

  for (const ch of text) {
    current += ch;
    if (SENTENCE_BREAKERS.has(ch)) {
      const trimmed = current.trim();
      if (trimmed) parts.push(trimmed);
      current = '';
    }
  }

  const tail = current.trim();
  if (tail) parts.push(tail);

  return parts;
}

// ============ Tokens ============

/**
 * Tokenize text into lowercase word tokens.
 * Apostrophes are stripped (can't → cant) after idioms are joined.
 */
export function tokenize(text: string, idioms: readonly Idiom[] = DEFAULT_IDIOMS): string[] {
  if (!text || !text.trim()) return [];

  let joined = normalizeText(text).replace(/'/g, '');
  for (const idiom of idioms) {
    joined = joined.replace(idiom.pattern, idiom.replacement);
  }

  return joined.split(TOKEN_SPLIT_RE).filter((t) => t.length > 0);
}

/**
 * Light suffix stripper. "worries" → "worry", "deadlines" → "deadline",
 * "stressed" → "stress". Exceptions are returned untouched.
 */
export function lightStem(token: string): string {
  if (STEM_EXCEPTIONS.has(token)) return token;

  for (const suffix of STEM_SUFFIXES) {
    if (token.endsWith(suffix) && token.length - suffix.length >= MIN_STEM_LENGTH) {
      const stem = token.slice(0, -suffix.length);
      return suffix === 'ies' ? `${stem}y` : stem;
    }
  }

  return token;
}

/** True when the token or its light stem is in the set */
export function inLexicon(token: string, set: ReadonlySet<string>): boolean {
  return set.has(token) || set.has(lightStem(token));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
