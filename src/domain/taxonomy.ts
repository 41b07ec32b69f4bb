/**
 * The 18-domain life-area taxonomy. Order here is the tie-break order
 * for equal scores.
 */
export const DOMAINS = [
  'Exercise/Fitness',
  'Family',
  'Friends',
  'Relationships/Marriage/Partnership',
  'Love/Romance',
  'Food/Eating',
  'Sleep/Rest',
  'Health/Medical',
  'Work/Career',
  'Money/Finances',
  'School/Learning',
  'Spirituality/Religion',
  'Recreation/Leisure',
  'Travel/Nature',
  'Creativity/Art',
  'Community/Society/Politics',
  'Technology/Media/Internet',
  'Self/Growth/Habits',
] as const;

export type DomainName = (typeof DOMAINS)[number];

export type DomainScores = Record<DomainName, number>;

/** A domain with a 0..1 confidence, as passed to the engine and prompt bank */
export interface DomainHint {
  domain: DomainName;
  confidence: number;
}

/** Reported when no domain clears the minimum score */
export const GENERAL_DOMAIN = 'General/Other';

const DOMAIN_SET: ReadonlySet<string> = new Set(DOMAINS);

export function isDomainName(value: string): value is DomainName {
  return DOMAIN_SET.has(value);
}

export function domainOrder(domain: DomainName): number {
  return DOMAINS.indexOf(domain);
}

const ZERO_SCORES: DomainScores = {
  'Exercise/Fitness': 0,
  Family: 0,
  Friends: 0,
  'Relationships/Marriage/Partnership': 0,
  'Love/Romance': 0,
  'Food/Eating': 0,
  'Sleep/Rest': 0,
  'Health/Medical': 0,
  'Work/Career': 0,
  'Money/Finances': 0,
  'School/Learning': 0,
  'Spirituality/Religion': 0,
  'Recreation/Leisure': 0,
  'Travel/Nature': 0,
  'Creativity/Art': 0,
  'Community/Society/Politics': 0,
  'Technology/Media/Internet': 0,
  'Self/Growth/Habits': 0,
};

export function emptyDomainScores(): DomainScores {
  return { ...ZERO_SCORES };
}

/** Highest-confidence hint; the first one wins a tie */
export function topDomainHint(hints: readonly DomainHint[]): DomainHint | undefined {
  let top: DomainHint | undefined;
  for (const hint of hints) {
    if (!top || hint.confidence > top.confidence) top = hint;
  }
  return top;
}
