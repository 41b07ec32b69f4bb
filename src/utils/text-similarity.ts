/**
 * Shared text similarity utilities.
 *
 * Word-bigram Jaccard metric used by the variant controller to avoid
 * emitting a response that reads like the previous one, and by recall
 * to skip snippets that merely echo the current input.
 */

/** Similarity at or above which two responses count as repeats */
export const REPEAT_SIMILARITY_THRESHOLD = 0.45;

/**
 * Lowercase word tokens with punctuation stripped.
 */
function words(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/['’]/g, '')
    .split(/[^\p{L}\p{N}]+/u)
    .filter((w) => w.length > 0);
}

/**
 * Set of adjacent word pairs, joined with a space.
 */
export function wordBigrams(text: string): Set<string> {
  const tokens = words(text);
  const bigrams = new Set<string>();
  for (let i = 0; i + 1 < tokens.length; i++) {
    bigrams.add(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return bigrams;
}

/**
 * Jaccard index over word bigrams: |A ∩ B| / |A ∪ B|.
 * Returns 0 when either side has fewer than two words.
 */
export function bigramSimilarity(a: string, b: string): number {
  const bigramsA = wordBigrams(a);
  const bigramsB = wordBigrams(b);

  if (bigramsA.size === 0 || bigramsB.size === 0) return 0;

  let intersectionCount = 0;
  for (const bigram of bigramsA) {
    if (bigramsB.has(bigram)) intersectionCount++;
  }

  const unionSize = bigramsA.size + bigramsB.size - intersectionCount;
  return intersectionCount / unionSize;
}
