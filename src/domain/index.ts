export {
  DomainClassifier,
  PHRASE_WEIGHT,
  KEYWORD_WEIGHT,
  KIN_BIAS,
  RECENCY_WEIGHT,
  type DomainResult,
  type DomainScore,
  type DomainClassifierOptions,
} from './classifier.js';
export {
  DOMAINS,
  GENERAL_DOMAIN,
  isDomainName,
  domainOrder,
  emptyDomainScores,
  topDomainHint,
  type DomainName,
  type DomainHint,
  type DomainScores,
} from './taxonomy.js';
