/**
 * Capture handling and punctuation cleanup for rule templates.
 */

import { toSecondPerson } from './pronouns.js';

// ============ Constants ============

/** Captures shorter than this (spaces ignored) fall back to a non-splice variant */
export const MIN_CAPTURE_CHARS = 3;
export const MAX_CAPTURE_WORDS = 12;

/** Words that read better after a comma when spliced right after a word */
const CONNECTIVES = new Set(['and', 'but', 'which', 'that', 'who', 'whom', 'because', 'since']);

const WORD_CHAR = /[\p{L}\p{N}_']/u;
const PLACEHOLDER_RE = /\$(\d)/g;

// ============ Captures ============

export interface Span {
  start: number;
  end: number;
}

/**
 * Widen a span to whole words, but only where a boundary falls inside a word.
 * A span that already starts or ends on a boundary is left alone.
 */
export function snapToWords(text: string, span: Span): Span {
  let { start, end } = span;
  const isWord = (index: number) => index >= 0 && index < text.length && WORD_CHAR.test(text.charAt(index));

  if (isWord(start) && isWord(start - 1)) {
    while (isWord(start - 1)) start--;
  }
  if (end > start && isWord(end - 1) && isWord(end)) {
    while (isWord(end)) end++;
  }

  return { start, end };
}

/**
 * Trim, normalize a leading comma, drop trailing sentence marks, collapse spaces.
 */
export function cleanCapture(capture: string): string {
  return capture
    .trim()
    .replace(/^,\s*/, ', ')
    .replace(/[.!?]+$/, '')
    .replace(/\s{2,}/g, ' ')
    .trim();
}

export function isUsableCapture(capture: string): boolean {
  return capture.replace(/\s/g, '').length >= MIN_CAPTURE_CHARS;
}

/** Keep the first `max` words */
export function clipWords(text: string, max: number = MAX_CAPTURE_WORDS): string {
  const words = text.split(' ');
  return words.length > max ? words.slice(0, max).join(' ') : text;
}

/**
 * Snap, clean and shift a raw capture to second person.
 * Returns undefined when what is left is too short to echo.
 */
export function prepareCapture(sentence: string, span: Span | undefined): string | undefined {
  if (!span || span.end <= span.start) return undefined;

  const snapped = snapToWords(sentence, span);
  const cleaned = cleanCapture(sentence.slice(snapped.start, snapped.end));
  if (!isUsableCapture(cleaned)) return undefined;

  return toSecondPerson(clipWords(cleaned));
}

// ============ Templates ============

/** Placeholder numbers a template refers to, e.g. [1, 2] */
export function placeholders(template: string): number[] {
  const found = new Set<number>();
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    found.add(Number(match[1]));
  }
  return [...found].sort((a, b) => a - b);
}

/**
 * Replace every `token` in `host` with `capture`, adding a space when the
 * token sits right after a word, or ", " when the capture opens with a
 * connective or a comma.
 */
export function spliceCapture(host: string, token: string, capture: string): string {
  const index = host.indexOf(token);
  if (index < 0) return host;

  let insertion = capture;
  const prefix = host.slice(0, index);
  if (/[\p{L}\p{N}]$/u.test(prefix) && capture.length > 0) {
    const firstWord = (capture.split(' ')[0] ?? '').toLowerCase();
    if (capture.startsWith(',')) {
      insertion = `, ${capture.slice(1).trim()}`;
    } else if (CONNECTIVES.has(firstWord)) {
      insertion = `, ${capture}`;
    } else {
      insertion = ` ${capture}`;
    }
  }

  return host.split(token).join(insertion);
}

/**
 * Fill `$n` placeholders. Missing captures are removed.
 */
export function fillTemplate(template: string, captures: ReadonlyMap<number, string>): string {
  let out = template;
  // Highest first so "$1" never eats the front of "$12"
  for (const n of placeholders(template).reverse()) {
    out = spliceCapture(out, `$${n}`, captures.get(n) ?? '');
  }
  return out;
}

// ============ Punctuation ============

/**
 * Collapse whitespace and repeated marks, and drop spaces before punctuation.
 */
export function tidyPunctuation(text: string): string {
  return text
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/\s+/g, ' ')
    .replace(/\s+([,.!?])/g, '$1')
    .replace(/,+/g, ',')
    .replace(/,([.!?])/g, '$1')
    .replace(/([.!?])[.!?]+/g, '$1')
    .trim();
}

/** Exactly one terminal mark */
export function ensureTerminal(text: string): string {
  if (!text) return text;
  return /[.!?]$/.test(text) ? text : `${text}.`;
}

/** Uppercase the first letter and every letter opening a new sentence */
export function capitalizeSentences(text: string): string {
  return text.replace(/(^|[.!?]\s+)(["']?)(\p{Ll})/gu, (_m, lead: string, quote: string, letter: string) => {
    return `${lead}${quote}${letter.toUpperCase()}`;
  });
}

/** Full cleanup applied to every assembled response */
export function finishSentence(text: string): string {
  return capitalizeSentences(ensureTerminal(tidyPunctuation(text)));
}
