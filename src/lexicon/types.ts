import type { BaseEmotionId } from '../emotion/types.js';
import type { DomainName } from '../domain/taxonomy.js';

/**
 * A compiled phrase pattern. `apply` bumps some categories and may zero
 * others in a clause-local score record.
 */
export interface PhraseRule<K extends PropertyKey> {
  source: string;
  pattern: RegExp;
  apply(scores: Record<K, number>): void;
}

export interface EmotionLexicon {
  terms: ReadonlyMap<BaseEmotionId, ReadonlySet<string>>;
  intensifiers: ReadonlySet<string>;
  dampeners: ReadonlySet<string>;
  negators: ReadonlySet<string>;
  phrases: readonly PhraseRule<BaseEmotionId>[];
  emoji: ReadonlyMap<string, BaseEmotionId>;
}

/** A regex whose match adds the phrase weight to one domain */
export interface DomainPhrase {
  domain: DomainName;
  source: string;
  pattern: RegExp;
}

export interface DomainLexicon {
  keywords: ReadonlyMap<DomainName, ReadonlySet<string>>;
  phrases: readonly DomainPhrase[];
  /** Applied after keyword scoring so they can zero a competing domain */
  overrides: readonly PhraseRule<DomainName>[];
  kinTerms: ReadonlySet<string>;
  spouseTerms: ReadonlySet<string>;
}
