export { LexiconStore, getDefaultLexiconStore, compilePhraseRule, EMOTION_LEXICON_FILE, DOMAIN_LEXICON_FILE } from './store.js';
export type { LexiconStoreOptions } from './store.js';
export { LexiconError } from './errors.js';
export { DATA_DIR, dataFilePath, readJsonFile, compilePattern, formatIssues } from './data-file.js';
export { readOverlay, mergeEmotionOverlay, mergeDomainOverlay } from './overlay.js';
export type { EmotionLexiconOverlay, DomainLexiconOverlay } from './schema.js';
export type { EmotionLexicon, DomainLexicon, DomainPhrase, PhraseRule } from './types.js';
