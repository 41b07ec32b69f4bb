export {
  normalizeText,
  normalizeEntry,
  compileIdiom,
  compileIdioms,
  splitSentences,
  tokenize,
  lightStem,
  inLexicon,
  DEFAULT_IDIOMS,
  STEM_EXCEPTIONS,
  type Idiom,
} from './segment.js';
export {
  graphemes,
  graphemeLength,
  sliceSelection,
  effectiveText,
  SelectionRangeError,
  type TextSpan,
} from './selection.js';
