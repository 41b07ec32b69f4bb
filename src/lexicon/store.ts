/**
 * Lexicon and pattern store.
 *
 * Loads the bundled emotion and domain lexicons, merges any overlays,
 * normalizes every entry to token form, and compiles phrase patterns into
 * closures. Built once at startup and shared read-only by the classifiers.
 */

import type { Logger } from 'pino';
import { EMOTION_ID_BY_KEY, EMOTION_KEYS, type BaseEmotionId, type EmotionKey } from '../emotion/types.js';
import { DOMAINS, type DomainName } from '../domain/taxonomy.js';
import { compileIdioms, normalizeEntry, tokenize, type Idiom } from '../text/segment.js';
import { silentLogger } from '../utils/logger.js';
import { compilePattern, dataFilePath, readJsonFile } from './data-file.js';
import { mergeDomainOverlay, mergeEmotionOverlay, readOverlay } from './overlay.js';
import {
  domainLexiconFileSchema,
  domainOverlaySchema,
  emotionLexiconFileSchema,
  emotionOverlaySchema,
  type DomainLexiconFile,
  type EmotionLexiconFile,
} from './schema.js';
import type { DomainLexicon, DomainPhrase, EmotionLexicon, PhraseRule } from './types.js';

export const EMOTION_LEXICON_FILE = 'emotion-lexicon.json';
export const DOMAIN_LEXICON_FILE = 'domain-lexicon.json';

export interface LexiconStoreOptions {
  logger?: Logger;
  /** Overrides the bundled emotion lexicon (tests, custom builds) */
  emotionLexiconPath?: string;
  domainLexiconPath?: string;
  emotionOverlayPath?: string;
  domainOverlayPath?: string;
}

// ============ Compilation ============

/**
 * Build a phrase closure from per-category bumps and zeroed categories.
 */
export function compilePhraseRule<K extends PropertyKey>(
  source: string,
  pattern: RegExp,
  bumps: ReadonlyArray<readonly [K, number]>,
  zero: readonly K[],
): PhraseRule<K> {
  return {
    source,
    pattern,
    apply(scores) {
      for (const [key, amount] of bumps) scores[key] += amount;
      for (const key of zero) scores[key] = 0;
    },
  };
}

function wordSet(entries: readonly string[]): Set<string> {
  return new Set(entries.map(normalizeEntry).filter((e) => e.length > 0));
}

function emotionBumps(add: Partial<Record<EmotionKey, number>>): Array<readonly [BaseEmotionId, number]> {
  const bumps: Array<readonly [BaseEmotionId, number]> = [];
  for (const key of EMOTION_KEYS) {
    const amount = add[key];
    if (amount !== undefined) bumps.push([EMOTION_ID_BY_KEY[key], amount]);
  }
  return bumps;
}

function domainBumps(add: Partial<Record<DomainName, number>>): Array<readonly [DomainName, number]> {
  const bumps: Array<readonly [DomainName, number]> = [];
  for (const domain of DOMAINS) {
    const amount = add[domain];
    if (amount !== undefined) bumps.push([domain, amount]);
  }
  return bumps;
}

export function compileEmotionLexicon(file: EmotionLexiconFile, origin: string): EmotionLexicon {
  const terms = new Map<BaseEmotionId, Set<string>>();
  for (const key of EMOTION_KEYS) {
    terms.set(EMOTION_ID_BY_KEY[key], wordSet(file.lexicons[key]));
  }

  const phrases = file.phrases.map((phrase) =>
    compilePhraseRule(
      phrase.pattern,
      compilePattern(phrase.pattern, origin),
      emotionBumps(phrase.add),
      phrase.zero.map((key) => EMOTION_ID_BY_KEY[key]),
    ),
  );

  const emoji = new Map<string, BaseEmotionId>();
  for (const [symbol, key] of Object.entries(file.emoji)) {
    emoji.set(symbol, EMOTION_ID_BY_KEY[key]);
  }

  return {
    terms,
    intensifiers: wordSet(file.intensifiers),
    dampeners: wordSet(file.dampeners),
    negators: wordSet(file.negators),
    phrases,
    emoji,
  };
}

export function compileDomainLexicon(file: DomainLexiconFile, origin: string): DomainLexicon {
  const keywords = new Map<DomainName, Set<string>>();
  const phrases: DomainPhrase[] = [];

  for (const domain of DOMAINS) {
    keywords.set(domain, wordSet(file.keywords[domain] ?? []));
    for (const source of file.phrases[domain] ?? []) {
      phrases.push({ domain, source, pattern: compilePattern(source, origin) });
    }
  }

  const overrides = file.overrides.map((override) =>
    compilePhraseRule(override.pattern, compilePattern(override.pattern, origin), domainBumps(override.add), override.zero),
  );

  return {
    keywords,
    phrases,
    overrides,
    kinTerms: wordSet(file.kinTerms),
    spouseTerms: wordSet(file.spouseTerms),
  };
}

/** Every multi-word entry becomes an idiom joined before tokenizing */
function collectIdiomEntries(emotion: EmotionLexiconFile, domain: DomainLexiconFile): string[] {
  const entries: string[] = [];
  for (const key of EMOTION_KEYS) entries.push(...emotion.lexicons[key]);
  entries.push(...emotion.intensifiers, ...emotion.dampeners, ...emotion.negators);
  for (const domainName of DOMAINS) entries.push(...(domain.keywords[domainName] ?? []));
  entries.push(...domain.kinTerms, ...domain.spouseTerms);
  return entries;
}

// ============ Store ============

export class LexiconStore {
  readonly emotion: EmotionLexicon;
  readonly domain: DomainLexicon;
  readonly idioms: readonly Idiom[];
  private logger: Logger;

  /**
   * @throws LexiconError when the bundled data is missing or invalid
   */
  constructor(options: LexiconStoreOptions = {}) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'lexicon' });

    const emotionPath = options.emotionLexiconPath ?? dataFilePath(EMOTION_LEXICON_FILE);
    const domainPath = options.domainLexiconPath ?? dataFilePath(DOMAIN_LEXICON_FILE);

    let emotionFile = readJsonFile(emotionPath, emotionLexiconFileSchema);
    let domainFile = readJsonFile(domainPath, domainLexiconFileSchema);

    let emotion = compileEmotionLexicon(emotionFile, emotionPath);
    let domain = compileDomainLexicon(domainFile, domainPath);

    if (options.emotionOverlayPath) {
      const overlayPath = options.emotionOverlayPath;
      const overlay = readOverlay(overlayPath, emotionOverlaySchema, this.logger);
      if (overlay) {
        emotionFile = mergeEmotionOverlay(emotionFile, overlay);
        emotion = compileEmotionLexicon(emotionFile, overlayPath);
        this.logger.debug({ path: overlayPath }, 'Merged emotion lexicon overlay');
      }
    }

    if (options.domainOverlayPath) {
      const overlayPath = options.domainOverlayPath;
      const overlay = readOverlay(overlayPath, domainOverlaySchema, this.logger);
      if (overlay) {
        try {
          const merged = mergeDomainOverlay(domainFile, overlay);
          domain = compileDomainLexicon(merged, overlayPath);
          domainFile = merged;
          this.logger.debug({ path: overlayPath }, 'Merged domain lexicon overlay');
        } catch (err) {
          this.logger.warn({ err, path: overlayPath }, 'Ignoring lexicon overlay with invalid pattern');
        }
      }
    }

    this.emotion = emotion;
    this.domain = domain;
    this.idioms = compileIdioms(collectIdiomEntries(emotionFile, domainFile));

    this.logger.debug(
      { idioms: this.idioms.length, emotionPhrases: emotion.phrases.length, domainPhrases: domain.phrases.length },
      'Lexicons loaded',
    );
  }

  /** Tokenize with every idiom this store knows */
  tokenize(text: string): string[] {
    return tokenize(text, this.idioms);
  }
}

let sharedStore: LexiconStore | null = null;

/**
 * Store built from the bundled data only, created on first use.
 */
export function getDefaultLexiconStore(): LexiconStore {
  if (!sharedStore) {
    sharedStore = new LexiconStore();
  }
  return sharedStore;
}
