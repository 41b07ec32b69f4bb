/**
 * Active-listening engine.
 *
 * Produces one short reflective sentence per input, trying in order:
 * a rule match, a recall of something said earlier, a domain pool, an
 * emotion pool, a generic open prompt, and a fixed last resort.
 *
 * Deterministic given the same prior state. State is per instance; callers
 * sharing an engine must serialize calls.
 */

import type { Logger } from 'pino';
import { topDomainHint, type DomainHint, type DomainName } from '../domain/taxonomy.js';
import type { EmotionId } from '../emotion/types.js';
import { splitSentences } from '../text/segment.js';
import { DEFAULT_HISTORY_CAPACITY, pushBounded } from '../utils/bounded.js';
import { silentLogger } from '../utils/logger.js';
import { REPEAT_SIMILARITY_THRESHOLD } from '../utils/text-similarity.js';
import { loadListeningPools, type ListeningPools } from './pools.js';
import { sanitizePossessiveEcho } from './pronouns.js';
import { clipChars, isRecallDue, recallCarriers, recallSnippet } from './recall.js';
import { loadListeningRules, type ListeningRule } from './rules.js';
import { fillTemplate, finishSentence, placeholders, prepareCapture } from './template.js';
import { VariantController, type VariantControllerState } from './variant-controller.js';

// ============ Types ============

export type ResponseStage = 'rule' | 'recall' | 'domain' | 'emotion' | 'generic' | 'last-resort';

export interface ListeningReply {
  text: string;
  stage: ResponseStage;
  /** Cooldown family the reply was recorded under */
  family: string;
  /** Set for rule matches */
  ruleKey?: string;
}

export interface EngineState extends VariantControllerState {
  stepCounter: number;
  lastRecallStep?: number;
  memory: string[];
}

export interface ListeningEngineOptions {
  logger?: Logger;
  rules?: readonly ListeningRule[];
  pools?: ListeningPools;
  /** Minimum hint confidence for the domain fallback (default 0.45) */
  domainHintThreshold?: number;
  variantCooldown?: number;
  familyCooldownWindow?: number;
  similarityThreshold?: number;
  /** Capacity of every history FIFO, memory included (default 16) */
  historyCapacity?: number;
}

interface RuleCandidate {
  rule: ListeningRule;
  text: string;
  index: number;
  score: number;
}

// ============ Constants ============

/** Added to a rule score when it matched the newest sentence */
export const NEWEST_SENTENCE_BONUS = 2;

export const RECALL_FAMILY = 'recall';
export const GENERIC_FAMILY = 'fb:open';
export const LAST_RESORT_FAMILY = 'last-resort';

export function ruleFamily(key: string): string {
  return `rule:${key}`;
}

export function domainFamily(domain: DomainName): string {
  return `dom:${domain}`;
}

export function emotionFamily(emotion: EmotionId): string {
  return `fb:${emotion}`;
}

// ============ Engine ============

export class ListeningEngine {
  private logger: Logger;
  private rules: readonly ListeningRule[];
  private pools: ListeningPools;
  private controller: VariantController;
  private domainHintThreshold: number;
  private similarityThreshold: number;
  private capacity: number;

  private stepCounter = 0;
  private lastRecallStep: number | undefined;
  private memory: string[] = [];

  /**
   * @throws LexiconError when the bundled rules or pools cannot be loaded
   */
  constructor(options: ListeningEngineOptions = {}) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'listening' });
    this.rules = options.rules ?? loadListeningRules();
    this.pools = options.pools ?? loadListeningPools();
    this.domainHintThreshold = options.domainHintThreshold ?? 0.45;
    this.similarityThreshold = options.similarityThreshold ?? REPEAT_SIMILARITY_THRESHOLD;
    this.capacity = options.historyCapacity ?? DEFAULT_HISTORY_CAPACITY;
    this.controller = new VariantController({
      variantCooldown: options.variantCooldown,
      familyCooldownWindow: options.familyCooldownWindow,
      similarityThreshold: this.similarityThreshold,
      capacity: this.capacity,
    });
  }

  /**
   * One reflective sentence, or undefined for empty input.
   */
  respond(input: string, emotion: EmotionId = 7, domains?: readonly DomainHint[]): string | undefined {
    return this.reply(input, emotion, domains)?.text;
  }

  /**
   * Like respond, but also reports which stage produced the sentence.
   */
  reply(input: string, emotion: EmotionId = 7, domains?: readonly DomainHint[]): ListeningReply | undefined {
    this.stepCounter += 1;

    const cleaned = input.trim();
    if (!cleaned) return undefined;

    const reply = this.select(cleaned, emotion, domains ?? []);
    pushBounded(this.memory, clipChars(cleaned), this.capacity);
    this.controller.recordFamilyUse(reply.family);

    this.logger.debug(
      { step: this.stepCounter, stage: reply.stage, family: reply.family, ruleKey: reply.ruleKey },
      'Listening reply chosen',
    );
    return reply;
  }

  /** Deep copy of the current state */
  snapshot(): EngineState {
    return {
      ...this.controller.snapshot(),
      stepCounter: this.stepCounter,
      lastRecallStep: this.lastRecallStep,
      memory: [...this.memory],
    };
  }

  reset(): void {
    this.stepCounter = 0;
    this.lastRecallStep = undefined;
    this.memory = [];
    this.controller.reset();
  }

  private select(input: string, emotion: EmotionId, domains: readonly DomainHint[]): ListeningReply {
    const matched = this.matchRules(input);
    if (matched) {
      this.controller.commit(matched.rule.key, matched.index, matched.text);
      return { text: matched.text, stage: 'rule', family: ruleFamily(matched.rule.key), ruleKey: matched.rule.key };
    }

    const recall = this.tryRecall(input);
    if (recall) {
      return { text: recall, stage: 'recall', family: RECALL_FAMILY };
    }

    const domain = this.pickDomainHint(domains);
    if (domain) {
      const family = domainFamily(domain);
      const pool = this.pools.domain.get(domain);
      const text = pool && this.controller.chooseVariant(pool, family);
      if (text) return { text, stage: 'domain', family };
    }

    const emotionPool = this.pools.emotion.get(emotion);
    const emotionKey = emotionFamily(emotion);
    if (emotionPool && this.controller.canUseFamily(emotionKey)) {
      const text = this.controller.chooseVariant(emotionPool, emotionKey);
      if (text) return { text, stage: 'emotion', family: emotionKey };
    }

    if (this.controller.canUseFamily(GENERIC_FAMILY)) {
      const text = this.controller.chooseVariant(this.pools.generic, GENERIC_FAMILY);
      if (text) return { text, stage: 'generic', family: GENERIC_FAMILY };
    }

    return { text: this.pools.lastResort, stage: 'last-resort', family: LAST_RESORT_FAMILY };
  }

  // ============ Rule stage ============

  /**
   * Sentences newest first; the first sentence with any match decides.
   * Nothing is committed here.
   */
  private matchRules(input: string): RuleCandidate | undefined {
    const sentences = splitSentences(input.replace(/[‘’]/g, "'").replace(/[“”]/g, '"')).reverse();

    for (let position = 0; position < sentences.length; position++) {
      const sentence = sentences[position];
      if (sentence === undefined) continue;

      let best: RuleCandidate | undefined;
      for (const rule of this.rules) {
        const match = rule.pattern.exec(sentence);
        if (!match) continue;

        const candidate = this.assemble(rule, sentence, match);
        if (!candidate) continue;

        const score = rule.weight + rule.specificity + (position === 0 ? NEWEST_SENTENCE_BONUS : 0);
        if (!best || score > best.score) {
          best = { rule, text: candidate.text, index: candidate.index, score };
        }
      }

      if (best) return best;
    }

    return undefined;
  }

  private assemble(
    rule: ListeningRule,
    sentence: string,
    match: RegExpExecArray,
  ): { text: string; index: number } | undefined {
    const captures = new Map<number, string>();
    for (let group = 1; group <= rule.captureGroups; group++) {
      const offsets = match.indices?.[group];
      const capture = prepareCapture(sentence, offsets ? { start: offsets[0], end: offsets[1] } : undefined);
      if (capture !== undefined) captures.set(group, capture);
    }

    const viable = new Set<number>();
    rule.responses.forEach((variant, index) => {
      if (!variant.requiresCapture || placeholders(variant.template).every((n) => captures.has(n))) {
        viable.add(index);
      }
    });

    const templates = rule.responses.map((variant) => variant.template);
    const pick = this.controller.peek(templates, rule.key, viable.size > 0 ? (index) => viable.has(index) : undefined);
    if (!pick) return undefined;

    const text = finishSentence(sanitizePossessiveEcho(fillTemplate(pick.text, captures)));
    return text ? { text, index: pick.index } : undefined;
  }

  // ============ Recall ============

  private tryRecall(input: string): string | undefined {
    if (!isRecallDue(this.stepCounter, this.lastRecallStep)) return undefined;

    const remembered = this.memory[this.memory.length - 1];
    if (remembered === undefined) return undefined;

    const snippet = recallSnippet(remembered, input, this.similarityThreshold);
    if (!snippet) return undefined;

    const text = this.controller.chooseVariant(recallCarriers(this.pools.recall, snippet), RECALL_FAMILY);
    if (!text) return undefined;

    this.lastRecallStep = this.stepCounter;
    return text;
  }

  // ============ Domain ============

  /** Highest-confidence hint when it clears the threshold and its family is free */
  private pickDomainHint(domains: readonly DomainHint[]): DomainName | undefined {
    const top = topDomainHint(domains);
    if (!top || top.confidence < this.domainHintThreshold) return undefined;
    if (!this.pools.domain.has(top.domain)) return undefined;
    if (!this.controller.canUseFamily(domainFamily(top.domain))) return undefined;
    return top.domain;
  }
}
