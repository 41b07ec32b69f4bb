// journal-lens - rule-based journal entry analysis
// Main entry point for library usage

export * from './config/index.js';
export * from './text/index.js';
export * from './lexicon/index.js';
export * from './emotion/index.js';
export * from './domain/index.js';
export * from './listening/index.js';
export * from './prompts/index.js';
export * from './analysis/index.js';
export * from './utils/index.js';
