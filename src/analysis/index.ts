export {
  JournalAnalyzer,
  type JournalAnalyzerOptions,
  type JournalReport,
  type AnalyzerInput,
} from './journal-analyzer.js';
export {
  classificationInputSchema,
  resolveInput,
  resolveEmotionHint,
  resolveDomainHints,
  InputError,
  HintError,
  type ClassificationInput,
  type ResolvedInput,
} from './input.js';
export { toEmotionOutput, toDomainOutput, domainHintsFrom, type ClassificationOutput, type RankedScore } from './output.js';
