import { splitSentences } from '../text/segment.js';

export const MAX_TITLE_CHARS = 80;

/**
 * First sentence as a title: trailing periods dropped, cut to at most
 * `max` characters, at a word boundary when one falls in the back half.
 */
export function suggestTitle(text: string, max: number = MAX_TITLE_CHARS): string {
  const first = (splitSentences(text)[0] ?? '').replace(/\.+$/, '').trim();
  const chars = [...first];
  if (chars.length <= max) return first;

  const cut = chars.slice(0, max).join('');
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > max / 2 ? cut.slice(0, lastSpace) : cut).trimEnd();
}
