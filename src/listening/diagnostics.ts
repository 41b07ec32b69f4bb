/**
 * Surface checks over generated responses, used to compare engine
 * revisions on a batch of entries.
 */

export interface ResponseDiagnostics {
  grammar: number;
  punctuation: number;
  capitalization: number;
}

const GRAMMAR_CHECKS: readonly RegExp[] = [/\byou was\b/gi, /\byou is\b/gi, /\b(\p{L}+)\s+\1\b/giu];

const PUNCTUATION_CHECKS: readonly RegExp[] = [/\.\./g, /[!?]{2,}/g, /\s+[,.!?]/g];

/** Lowercase "i" standing alone; case-sensitive on purpose */
const STANDALONE_LOWER_I = /(?<![A-Za-z])i(?![A-Za-z])/g;

function countMatches(text: string, pattern: RegExp): number {
  return [...text.matchAll(pattern)].length;
}

function grammarIssues(text: string): number {
  return GRAMMAR_CHECKS.reduce((sum, pattern) => sum + countMatches(text, pattern), 0);
}

function punctuationIssues(text: string): number {
  let count = PUNCTUATION_CHECKS.reduce((sum, pattern) => sum + countMatches(text, pattern), 0);

  if (countMatches(text, /"/g) % 2 === 1) count++;

  const trimmed = text.trim();
  if (trimmed && !/[.!?]$/.test(trimmed)) count++;
  return count;
}

function capitalizationIssues(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 0;

  let count = 0;
  const first = trimmed.charAt(0);
  if (/\p{Ll}/u.test(first)) count++;
  count += countMatches(trimmed, STANDALONE_LOWER_I);
  return count;
}

/**
 * Totals across all responses.
 */
export function evaluateResponses(responses: readonly string[]): ResponseDiagnostics {
  const totals: ResponseDiagnostics = { grammar: 0, punctuation: 0, capitalization: 0 };
  for (const response of responses) {
    totals.grammar += grammarIssues(response);
    totals.punctuation += punctuationIssues(response);
    totals.capitalization += capitalizationIssues(response);
  }
  return totals;
}
