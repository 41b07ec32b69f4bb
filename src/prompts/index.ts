export {
  PromptBank,
  getDefaultPromptBank,
  journalPromptsFileSchema,
  COMBINED_PROMPT_THRESHOLD,
  JOURNAL_PROMPTS_FILE,
  type JournalPromptsFile,
} from './prompt-bank.js';
export { suggestTitle, MAX_TITLE_CHARS } from './title.js';
export { findRepetitionCue, lastParagraph } from './repetition-hint.js';
