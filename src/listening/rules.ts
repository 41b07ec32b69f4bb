/**
 * Active-listening rule table.
 *
 * Rules are compiled once from data/listening-rules.json, in file order.
 * Grouped entries (`patterns: [...]`) expand to one rule per pattern,
 * keyed `<key>.<n>`.
 */

import { z } from 'zod';
import { compilePattern, dataFilePath, readJsonFile } from '../lexicon/data-file.js';

export const LISTENING_RULES_FILE = 'listening-rules.json';

/** Capture groups counted toward specificity are capped here */
export const MAX_SPECIFICITY_CAPTURES = 3;

// ============ Types ============

export interface TemplateVariant {
  /** May contain `$1`..`$9` */
  template: string;
  /** Needs a usable capture for every placeholder it references */
  requiresCapture: boolean;
}

export interface ListeningRule {
  key: string;
  source: string;
  /** Compiled with the `d` flag so capture offsets are available */
  pattern: RegExp;
  responses: readonly TemplateVariant[];
  weight: number;
  /** weight + min(3, captureGroups); never below weight */
  specificity: number;
  captureGroups: number;
}

// ============ Schema ============

const variantSchema = z.object({
  template: z.string().min(1),
  requiresCapture: z.boolean().default(true),
});

const ruleEntrySchema = z
  .object({
    key: z.string().min(1),
    pattern: z.string().min(1).optional(),
    patterns: z.array(z.string().min(1)).min(1).optional(),
    weight: z.number().int().positive(),
    responses: z.array(variantSchema).min(1),
  })
  .refine((entry) => (entry.pattern === undefined) !== (entry.patterns === undefined), {
    message: 'Exactly one of "pattern" or "patterns" is required',
  });

export const listeningRulesFileSchema = z.object({
  rules: z.array(ruleEntrySchema).min(1),
});

export type ListeningRulesFile = z.infer<typeof listeningRulesFileSchema>;

// ============ Compilation ============

/**
 * Number of capture groups in a compiled pattern.
 */
export function countCaptureGroups(pattern: RegExp): number {
  // An empty alternative always matches, so the result length reveals the group count
  const probe = new RegExp(`${pattern.source}|`, pattern.flags).exec('');
  return probe ? probe.length - 1 : 0;
}

function compileRule(key: string, source: string, weight: number, responses: readonly TemplateVariant[], origin: string): ListeningRule {
  const pattern = compilePattern(source, origin, 'id');
  const captureGroups = countCaptureGroups(pattern);
  return {
    key,
    source,
    pattern,
    responses,
    weight,
    specificity: weight + Math.min(MAX_SPECIFICITY_CAPTURES, captureGroups),
    captureGroups,
  };
}

export function compileListeningRules(file: ListeningRulesFile, origin: string): ListeningRule[] {
  const rules: ListeningRule[] = [];

  for (const entry of file.rules) {
    if (entry.patterns) {
      entry.patterns.forEach((source, index) => {
        rules.push(compileRule(`${entry.key}.${index + 1}`, source, entry.weight, entry.responses, origin));
      });
    } else if (entry.pattern) {
      rules.push(compileRule(entry.key, entry.pattern, entry.weight, entry.responses, origin));
    }
  }

  return rules;
}

/**
 * @throws LexiconError when the file is missing, malformed, or has a bad pattern
 */
export function loadListeningRules(filePath: string = dataFilePath(LISTENING_RULES_FILE)): ListeningRule[] {
  return compileListeningRules(readJsonFile(filePath, listeningRulesFileSchema), filePath);
}
