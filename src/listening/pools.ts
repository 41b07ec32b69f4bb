/**
 * Fallback response pools: per emotion, per domain, generic open prompts,
 * recall carriers and the last-resort line.
 */

import { z } from 'zod';
import { DOMAINS, type DomainName } from '../domain/taxonomy.js';
import type { EmotionId } from '../emotion/types.js';
import { dataFilePath, readJsonFile } from '../lexicon/data-file.js';

export const LISTENING_POOLS_FILE = 'listening-pools.json';

/** Marker replaced by the recalled snippet in a recall carrier */
export const SNIPPET_MARKER = '{snippet}';

const poolSchema = z.array(z.string().min(1)).min(1);

export const listeningPoolsFileSchema = z.object({
  emotion: z.record(z.enum(['1', '2', '3', '4', '5', '6', '7', '8']), poolSchema),
  domain: z.record(z.enum(DOMAINS), poolSchema),
  generic: poolSchema,
  recall: z.array(z.string().includes(SNIPPET_MARKER)).min(1),
  lastResort: z.string().min(1),
});

export type ListeningPoolsFile = z.infer<typeof listeningPoolsFileSchema>;

export interface ListeningPools {
  emotion: ReadonlyMap<EmotionId, readonly string[]>;
  domain: ReadonlyMap<DomainName, readonly string[]>;
  generic: readonly string[];
  recall: readonly string[];
  lastResort: string;
}

const EMOTION_POOL_KEYS: ReadonlyArray<readonly [keyof ListeningPoolsFile['emotion'], EmotionId]> = [
  ['1', 1],
  ['2', 2],
  ['3', 3],
  ['4', 4],
  ['5', 5],
  ['6', 6],
  ['7', 7],
  ['8', 8],
];

export function compileListeningPools(file: ListeningPoolsFile): ListeningPools {
  const emotion = new Map<EmotionId, readonly string[]>();
  for (const [key, id] of EMOTION_POOL_KEYS) {
    const pool = file.emotion[key];
    if (pool) emotion.set(id, pool);
  }

  const domain = new Map<DomainName, readonly string[]>();
  for (const name of DOMAINS) {
    const pool = file.domain[name];
    if (pool) domain.set(name, pool);
  }

  return { emotion, domain, generic: file.generic, recall: file.recall, lastResort: file.lastResort };
}

/**
 * @throws LexiconError when the file is missing or malformed
 */
export function loadListeningPools(filePath: string = dataFilePath(LISTENING_POOLS_FILE)): ListeningPools {
  return compileListeningPools(readJsonFile(filePath, listeningPoolsFileSchema));
}
