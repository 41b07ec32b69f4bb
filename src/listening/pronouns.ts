/**
 * First-person to second-person rewriting for echoed user text.
 */

/** Ordered substitutions; the bare "I" must come last */
const SECOND_PERSON_SUBSTITUTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bI was\b/gi, 'you were'],
  [/\bI am\b/gi, 'you are'],
  [/\bI'm\b/gi, "you're"],
  [/\bI've\b/gi, "you've"],
  [/\bI'd\b/gi, "you'd"],
  [/\bI'll\b/gi, "you'll"],
  [/\bmyself\b/gi, 'yourself'],
  [/\bmy\b/gi, 'your'],
  [/\bmine\b/gi, 'yours'],
  [/\bme\b/gi, 'you'],
  [/\bI\b/gi, 'you'],
];

/**
 * "I was tired and my head hurt" → "you were tired and your head hurt".
 * Output is lowercase at every substituted word; callers capitalize.
 */
export function toSecondPerson(text: string): string {
  let out = text.replace(/[‘’]/g, "'");
  for (const [pattern, replacement] of SECOND_PERSON_SUBSTITUTIONS) {
    out = out.replace(pattern, replacement);
  }
  return out;
}

/**
 * "your mom and you talked" → "you and your mom talked".
 */
export function sanitizePossessiveEcho(text: string): string {
  return text.replace(/\byour ([\p{L}\p{N}'-]+) and you\b/giu, 'you and your $1');
}

/** Strip wrapping quotes left over from quoted journal lines */
export function stripQuotes(text: string): string {
  return text.replace(/^["'“”‘’\s]+|["'“”‘’\s]+$/g, '');
}
