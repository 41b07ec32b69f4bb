/**
 * Journal prompt bank.
 *
 * Suggests a writing prompt from the entry's emotion and, when a domain
 * hint is confident enough, a combined domain + emotion prompt. Also
 * carries the repetition hint text and its cues.
 */

import { z } from 'zod';
import { DOMAINS, topDomainHint, type DomainHint, type DomainName } from '../domain/taxonomy.js';
import { EMOTION_INFO, type EmotionId } from '../emotion/types.js';
import { dataFilePath, readJsonFile } from '../lexicon/data-file.js';
import { findRepetitionCue } from './repetition-hint.js';

export const JOURNAL_PROMPTS_FILE = 'journal-prompts.json';

/** Minimum top-hint confidence for a combined prompt */
export const COMBINED_PROMPT_THRESHOLD = 0.45;

const emotionPromptKeySchema = z.enum(['joy', 'sadness', 'anger', 'fear', 'surprise', 'disgust', 'neutral', 'mixed']);

type EmotionPromptKey = z.infer<typeof emotionPromptKeySchema>;

const promptMapSchema = z.record(emotionPromptKeySchema, z.string().min(1));

export const journalPromptsFileSchema = z.object({
  combined: z.record(z.enum(DOMAINS), promptMapSchema),
  emotion: promptMapSchema,
  generic: z.string().min(1),
  repetitionHint: z.string().min(1),
  repetitionCues: z.array(z.string().min(1)).min(1),
});

export type JournalPromptsFile = z.infer<typeof journalPromptsFileSchema>;

type PromptMap = Partial<Record<EmotionPromptKey, string>>;

export class PromptBank {
  private combined: ReadonlyMap<DomainName, PromptMap>;
  private emotion: PromptMap;
  private generic: string;
  private hint: string;
  private cues: readonly string[];

  constructor(file: JournalPromptsFile) {
    const combined = new Map<DomainName, PromptMap>();
    for (const domain of DOMAINS) {
      const prompts = file.combined[domain];
      if (prompts) combined.set(domain, prompts);
    }

    this.combined = combined;
    this.emotion = file.emotion;
    this.generic = file.generic;
    this.hint = file.repetitionHint;
    this.cues = file.repetitionCues;
  }

  /**
   * @throws LexiconError when the file is missing or malformed
   */
  static load(filePath: string = dataFilePath(JOURNAL_PROMPTS_FILE)): PromptBank {
    return new PromptBank(readJsonFile(filePath, journalPromptsFileSchema));
  }

  /**
   * Combined prompt when the top hint clears the threshold and the pair
   * exists, else the emotion prompt, else the generic one.
   */
  suggestPrompt(emotion: EmotionId, domains: readonly DomainHint[] = []): string {
    const key = EMOTION_INFO[emotion].key;
    const top = topDomainHint(domains);

    if (top && top.confidence >= COMBINED_PROMPT_THRESHOLD) {
      const combined = this.combined.get(top.domain)?.[key];
      if (combined) return combined;
    }

    return this.emotion[key] ?? this.generic;
  }

  /**
   * Non-directive hint when the last paragraph carries a looping cue.
   */
  repetitionHint(text: string): string | undefined {
    return findRepetitionCue(text, this.cues) === undefined ? undefined : this.hint;
  }
}

let sharedBank: PromptBank | null = null;

export function getDefaultPromptBank(): PromptBank {
  if (!sharedBank) {
    sharedBank = PromptBank.load();
  }
  return sharedBank;
}
