/**
 * Sub-selection of an entry, addressed in grapheme clusters so that an
 * emoji or an accented letter counts as one position.
 */

/** Half-open span `[start, end)` over grapheme clusters */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * Thrown when a selection does not fit inside the text it addresses.
 */
export class SelectionRangeError extends Error {
  constructor(
    message: string,
    public readonly span: TextSpan,
    public readonly length: number
  ) {
    super(message);
    this.name = 'SelectionRangeError';
  }
}

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Split text into grapheme clusters.
 */
export function graphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (s) => s.segment);
}

export function graphemeLength(text: string): number {
  return graphemes(text).length;
}

/**
 * Return the selected substring.
 * @throws SelectionRangeError for non-integer, reversed or out-of-bounds spans
 */
export function sliceSelection(text: string, span: TextSpan): string {
  const clusters = graphemes(text);
  const { start, end } = span;

  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new SelectionRangeError(`Selection bounds must be integers (got ${start}..${end})`, span, clusters.length);
  }
  if (start < 0 || end > clusters.length) {
    throw new SelectionRangeError(
      `Selection ${start}..${end} is outside the text (length ${clusters.length})`,
      span,
      clusters.length,
    );
  }
  if (start > end) {
    throw new SelectionRangeError(`Selection start ${start} is after end ${end}`, span, clusters.length);
  }

  return clusters.slice(start, end).join('');
}

/**
 * The text a classifier should see: the selection when one is given,
 * otherwise the whole entry.
 */
export function effectiveText(text: string, span?: TextSpan): string {
  return span ? sliceSelection(text, span) : text;
}
