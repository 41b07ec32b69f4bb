/**
 * Recall: echo an earlier remembered input back in second person.
 */

import { bigramSimilarity } from '../utils/text-similarity.js';
import { toSecondPerson, stripQuotes } from './pronouns.js';
import { ensureTerminal, tidyPunctuation } from './template.js';
import { SNIPPET_MARKER } from './pools.js';

export const SNIPPET_MAX_CHARS = 120;
export const RECALL_MIN_CHARS = 12;
export const RECALL_MAX_CHARS = 140;
/** Steps that must pass after a recall before another is allowed */
export const RECALL_COOLDOWN_STEPS = 3;

const RECALL_VERB_RE =
  /\b(?:am|are|is|was|were|feel|felt|want|wanted|think|thought|did|do|made|make|have|had|I've|I'd|I'll)\b/i;

/** Leading words that read better after "that" ("that yesterday you …") */
const RECALL_LEADS = new Set(['yesterday', 'today', 'tonight', 'this', 'that', 'your', 'my', 'our', 'the']);

/** Clip to `max` code points */
export function clipChars(text: string, max: number = SNIPPET_MAX_CHARS): string {
  const chars = [...text];
  return chars.length > max ? chars.slice(0, max).join('') : text;
}

export function isRecallDue(step: number, lastRecallStep: number | undefined): boolean {
  return lastRecallStep === undefined || step - lastRecallStep > RECALL_COOLDOWN_STEPS;
}

/**
 * "Yesterday you had coffee" → "that yesterday you had coffee".
 */
export function normalizeRecallLead(text: string): string {
  const trimmed = text.trim();
  const first = trimmed.split(' ')[0] ?? '';
  const plain = first.replace(/^[^\p{L}]+|[^\p{L}]+$/gu, '').toLowerCase();
  if (!RECALL_LEADS.has(plain)) return text;

  const rest = trimmed.slice(first.length).trim();
  return `that ${first.toLowerCase()}${rest ? ` ${rest}` : ''}`;
}

/**
 * Second-person snippet of a remembered input, or undefined when it is
 * out of range, has no verb, or mostly repeats the current input.
 */
export function recallSnippet(remembered: string, currentInput: string, similarityThreshold: number): string | undefined {
  const snippet = clipChars(remembered.replace(/\n/g, ' ').trim());
  const length = [...snippet].length;

  if (length < RECALL_MIN_CHARS || length > RECALL_MAX_CHARS) return undefined;
  if (!RECALL_VERB_RE.test(snippet)) return undefined;
  if (bigramSimilarity(snippet, currentInput) >= similarityThreshold) return undefined;

  const shifted = normalizeRecallLead(toSecondPerson(stripQuotes(snippet)));
  return ensureTerminal(tidyPunctuation(shifted));
}

/** Wrap a snippet in each carrier sentence */
export function recallCarriers(carriers: readonly string[], snippet: string): string[] {
  return carriers.map((carrier) => carrier.split(SNIPPET_MARKER).join(snippet));
}
