export { createLogger, silentLogger } from './logger.js';
export { bigramSimilarity, wordBigrams, REPEAT_SIMILARITY_THRESHOLD } from './text-similarity.js';
export { pushBounded, lastN, DEFAULT_HISTORY_CAPACITY } from './bounded.js';
