/**
 * Journal analyzer facade.
 *
 * Wires the lexicon store, both classifiers, the listening engine and the
 * prompt bank from one configuration. One instance is one journaling
 * session: the engine history lives here until resetSession().
 */

import type { Logger } from 'pino';
import { type Config, defaultConfig } from '../config/config.js';
import { DomainClassifier } from '../domain/classifier.js';
import { EmotionClassifier } from '../emotion/classifier.js';
import { LexiconStore } from '../lexicon/store.js';
import { ListeningEngine, type EngineState, type ResponseStage } from '../listening/engine.js';
import { getDefaultPromptBank, type PromptBank } from '../prompts/prompt-bank.js';
import { suggestTitle } from '../prompts/title.js';
import { silentLogger } from '../utils/logger.js';
import { resolveInput, type ClassificationInput, type ResolvedInput } from './input.js';
import { domainHintsFrom, toDomainOutput, toEmotionOutput, type ClassificationOutput } from './output.js';

export interface JournalAnalyzerOptions {
  config?: Config;
  logger?: Logger;
  store?: LexiconStore;
  promptBank?: PromptBank;
}

export interface JournalReport {
  emotion: ClassificationOutput;
  domain: ClassificationOutput;
  /** Undefined for empty input */
  response?: string;
  stage?: ResponseStage;
  topDomain: string;
  prompt: string;
  title: string;
  repetitionHint?: string;
}

export type AnalyzerInput = ClassificationInput | string;

export class JournalAnalyzer {
  private logger: Logger;
  private emotion: EmotionClassifier;
  private domain: DomainClassifier;
  private engine: ListeningEngine;
  private prompts: PromptBank;

  /**
   * @throws LexiconError when bundled data cannot be loaded
   */
  constructor(options: JournalAnalyzerOptions = {}) {
    const config = options.config ?? defaultConfig();
    const logger = options.logger ?? silentLogger();
    this.logger = logger.child({ component: 'analyzer' });

    const store =
      options.store ??
      new LexiconStore({
        logger,
        emotionOverlayPath: config.lexicon.emotionOverlayPath,
        domainOverlayPath: config.lexicon.domainOverlayPath,
      });

    this.emotion = new EmotionClassifier({ logger, store, ...config.emotion });
    this.domain = new DomainClassifier({ logger, store, ...config.domain });
    this.engine = new ListeningEngine({ logger, ...config.engine });
    this.prompts = options.promptBank ?? getDefaultPromptBank();
  }

  classifyEmotion(input: AnalyzerInput): ClassificationOutput {
    const { text } = resolveInput(input);
    return toEmotionOutput(this.emotion.classify(text));
  }

  classifyDomain(input: AnalyzerInput): ClassificationOutput {
    const { text } = resolveInput(input);
    return toDomainOutput(this.domain.classify(text));
  }

  /**
   * One reflective sentence. Contextual hints win over the classifiers.
   */
  respond(input: AnalyzerInput): string | undefined {
    const resolved = resolveInput(input);
    return this.reply(resolved).reply?.text;
  }

  analyze(input: AnalyzerInput): JournalReport {
    const resolved = resolveInput(input);
    const { emotion, domain, hints, reply } = this.reply(resolved);

    const report: JournalReport = {
      emotion: toEmotionOutput(emotion),
      domain: toDomainOutput(domain),
      response: reply?.text,
      stage: reply?.stage,
      topDomain: domain.primary,
      prompt: this.prompts.suggestPrompt(resolved.emotion ?? emotion.id, hints),
      title: suggestTitle(resolved.text),
      repetitionHint: this.prompts.repetitionHint(resolved.text),
    };

    this.logger.info({ emotion: emotion.label, topDomain: report.topDomain, stage: report.stage }, 'Entry analyzed');
    return report;
  }

  snapshot(): EngineState {
    return this.engine.snapshot();
  }

  resetSession(): void {
    this.engine.reset();
    this.logger.debug('Session reset');
  }

  private reply(resolved: ResolvedInput) {
    const emotion = this.emotion.classify(resolved.text);
    const domain = this.domain.classify(resolved.text);
    const hints = resolved.domains ?? domainHintsFrom(domain);
    const reply = this.engine.reply(resolved.text, resolved.emotion ?? emotion.id, hints);
    return { emotion, domain, hints, reply };
  }
}
