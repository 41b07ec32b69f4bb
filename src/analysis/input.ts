/**
 * Input boundary for the analyzer facade.
 *
 * Raw input is validated with zod, then contextual hints are resolved to
 * typed ids and domain names.
 */

import { z } from 'zod';
import { isDomainName, type DomainHint } from '../domain/taxonomy.js';
import { parseEmotion, type EmotionId } from '../emotion/types.js';
import { formatIssues } from '../lexicon/data-file.js';
import { effectiveText, type TextSpan } from '../text/selection.js';

// ============ Schema ============

export const classificationInputSchema = z.object({
  text: z.string(),
  selection: z
    .object({
      start: z.number(),
      end: z.number(),
    })
    .optional(),
  contextualEmotion: z.union([z.number(), z.string()]).optional(),
  contextualDomains: z
    .array(
      z.object({
        domain: z.string(),
        confidence: z.number(),
      }),
    )
    .optional(),
});

export type ClassificationInput = z.infer<typeof classificationInputSchema>;

// ============ Errors ============

/**
 * Thrown when the input does not have the expected shape.
 */
export class InputError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * Thrown for an unknown emotion or domain hint, or a confidence outside [0, 1].
 */
export class HintError extends Error {
  constructor(
    message: string,
    public readonly hint: string
  ) {
    super(message);
    this.name = 'HintError';
  }
}

// ============ Resolution ============

export interface ResolvedInput {
  /** Selected substring, or the whole text */
  text: string;
  selection?: TextSpan;
  emotion?: EmotionId;
  domains?: DomainHint[];
}

export function resolveEmotionHint(value: number | string): EmotionId {
  const id = parseEmotion(value);
  if (id === undefined) {
    throw new HintError(`Unknown emotion hint "${value}"`, String(value));
  }
  return id;
}

export function resolveDomainHints(hints: ReadonlyArray<{ domain: string; confidence: number }>): DomainHint[] {
  return hints.map(({ domain, confidence }) => {
    if (!isDomainName(domain)) {
      throw new HintError(`Unknown domain hint "${domain}"`, domain);
    }
    if (!(confidence >= 0 && confidence <= 1)) {
      throw new HintError(`Confidence for "${domain}" must be between 0 and 1 (got ${confidence})`, domain);
    }
    return { domain, confidence };
  });
}

/**
 * Validate raw input and resolve its selection and hints.
 * @throws InputError, SelectionRangeError or HintError
 */
export function resolveInput(raw: unknown): ResolvedInput {
  const parsed = classificationInputSchema.safeParse(typeof raw === 'string' ? { text: raw } : raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new InputError(`Invalid classification input:\n${issues.join('\n')}`, issues);
  }

  const input = parsed.data;
  return {
    text: effectiveText(input.text, input.selection),
    selection: input.selection,
    emotion: input.contextualEmotion === undefined ? undefined : resolveEmotionHint(input.contextualEmotion),
    domains: input.contextualDomains && resolveDomainHints(input.contextualDomains),
  };
}
