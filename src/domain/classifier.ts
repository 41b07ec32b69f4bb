/**
 * Rule-based life-domain classifier.
 *
 * Scores each sentence (newest first) with regex phrases, keyword hits,
 * hard overrides and a kin bias, then weights the newest sentence and
 * ranks every domain above the reporting floor.
 *
 * No I/O, no side effects, no async.
 */

import type { Logger } from 'pino';
import { getDefaultLexiconStore, type LexiconStore } from '../lexicon/store.js';
import { inLexicon, normalizeText, splitSentences } from '../text/segment.js';
import { silentLogger } from '../utils/logger.js';
import { DOMAINS, GENERAL_DOMAIN, emptyDomainScores, type DomainName, type DomainScores } from './taxonomy.js';

// ============ Types ============

export interface DomainScore {
  domain: DomainName;
  score: number;
}

export interface DomainResult {
  /** Domains at or above the reporting floor, highest first */
  ranked: DomainScore[];
  /** Top ranked domain, or General/Other when nothing qualifies */
  primary: DomainName | typeof GENERAL_DOMAIN;
  /** Rounded scores for every domain */
  scores: DomainScores;
}

export interface DomainClassifierOptions {
  logger?: Logger;
  store?: LexiconStore;
  /** Scores below this are not ranked (default 0.5) */
  minReportScore?: number;
}

// ============ Constants ============

export const PHRASE_WEIGHT = 2.5;
export const KEYWORD_WEIGHT = 1;
export const KIN_BIAS = 3;
export const RECENCY_WEIGHT = 1.15;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ============ Classifier ============

export class DomainClassifier {
  private logger: Logger;
  private store: LexiconStore;
  private minReportScore: number;

  constructor(options: DomainClassifierOptions = {}) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'domain' });
    this.store = options.store ?? getDefaultLexiconStore();
    this.minReportScore = options.minReportScore ?? 0.5;
  }

  classify(text: string): DomainResult {
    const totals = emptyDomainScores();
    const sentences = splitSentences(text).reverse();

    sentences.forEach((sentence, index) => {
      const local = this.scoreSentence(normalizeText(sentence));
      const weight = index === 0 ? RECENCY_WEIGHT : 1;
      for (const domain of DOMAINS) {
        totals[domain] += local[domain] * weight;
      }
    });

    const scores = emptyDomainScores();
    for (const domain of DOMAINS) {
      scores[domain] = round2(totals[domain]);
    }

    // Array#sort is stable, so equal scores keep taxonomy order
    const ranked = DOMAINS.filter((domain) => scores[domain] >= this.minReportScore)
      .map((domain) => ({ domain, score: scores[domain] }))
      .sort((a, b) => b.score - a.score);

    const primary = ranked[0]?.domain ?? GENERAL_DOMAIN;
    this.logger.debug({ primary, ranked, sentences: sentences.length }, 'Domain classified');

    return { ranked, primary, scores };
  }

  private scoreSentence(sentence: string): DomainScores {
    const lexicon = this.store.domain;
    const local = emptyDomainScores();

    for (const phrase of lexicon.phrases) {
      if (phrase.pattern.test(sentence)) {
        local[phrase.domain] += PHRASE_WEIGHT;
      }
    }

    const tokens = this.store.tokenize(sentence);
    for (const token of tokens) {
      for (const domain of DOMAINS) {
        const keywords = lexicon.keywords.get(domain);
        if (keywords && inLexicon(token, keywords)) {
          local[domain] += KEYWORD_WEIGHT;
        }
      }
    }

    for (const override of lexicon.overrides) {
      if (override.pattern.test(sentence)) {
        override.apply(local);
      }
    }

    // Spouse-type words never count as kin, so "my husband" alone gets no bias
    const hasKin = tokens.some(
      (token) => inLexicon(token, lexicon.kinTerms) && !inLexicon(token, lexicon.spouseTerms),
    );
    if (hasKin) {
      local.Family += KIN_BIAS;
    }

    return local;
  }
}
