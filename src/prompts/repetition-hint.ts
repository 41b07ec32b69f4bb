import { normalizeText } from '../text/segment.js';

/** Last non-empty paragraph, or the whole text */
export function lastParagraph(text: string): string {
  const paragraphs = text
    .split('\n')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  return paragraphs[paragraphs.length - 1] ?? text;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * First cue found as whole words in the last paragraph ("again", not "against").
 */
export function findRepetitionCue(text: string, cues: readonly string[]): string | undefined {
  const paragraph = normalizeText(lastParagraph(text));
  return cues.find((cue) => new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(cue)}(?![\\p{L}\\p{N}])`, 'u').test(paragraph));
}
