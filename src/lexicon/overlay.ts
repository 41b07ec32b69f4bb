/**
 * Optional JSON overlays that extend the built-in lexicons.
 *
 * Overlays only ever add entries. A missing file is skipped quietly; a file
 * that cannot be read, parsed or validated is logged and ignored.
 */

import * as fs from 'fs';
import type { Logger } from 'pino';
import type { z } from 'zod';
import { EMOTION_KEYS } from '../emotion/types.js';
import { DOMAINS } from '../domain/taxonomy.js';
import { readJsonFile } from './data-file.js';
import type {
  DomainLexiconFile,
  DomainLexiconOverlay,
  EmotionLexiconFile,
  EmotionLexiconOverlay,
} from './schema.js';

/**
 * Read an overlay file. Returns undefined when the file is absent or invalid.
 */
export function readOverlay<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  logger: Logger,
): T | undefined {
  if (!fs.existsSync(filePath)) {
    logger.debug({ path: filePath }, 'Lexicon overlay not found, skipping');
    return undefined;
  }

  try {
    return readJsonFile(filePath, schema);
  } catch (err) {
    logger.warn({ err, path: filePath }, 'Ignoring invalid lexicon overlay');
    return undefined;
  }
}

function union(base: readonly string[], extra: readonly string[] | undefined): string[] {
  return extra ? [...new Set([...base, ...extra])] : [...base];
}

export function mergeEmotionOverlay(base: EmotionLexiconFile, overlay: EmotionLexiconOverlay): EmotionLexiconFile {
  const lexicons = { ...base.lexicons };
  for (const key of EMOTION_KEYS) {
    lexicons[key] = union(base.lexicons[key], overlay[key]);
  }

  return {
    ...base,
    lexicons,
    intensifiers: union(base.intensifiers, overlay.intensifiers),
    dampeners: union(base.dampeners, overlay.dampeners),
    negators: union(base.negators, overlay.negators),
  };
}

export function mergeDomainOverlay(base: DomainLexiconFile, overlay: DomainLexiconOverlay): DomainLexiconFile {
  const keywords = { ...base.keywords };
  const phrases = { ...base.phrases };

  for (const domain of DOMAINS) {
    const extraWords = overlay.domains?.[domain];
    if (extraWords) keywords[domain] = union(base.keywords[domain] ?? [], extraWords);

    const extraPhrases = overlay.phrases?.[domain];
    if (extraPhrases) phrases[domain] = union(base.phrases[domain] ?? [], extraPhrases);
  }

  return { ...base, keywords, phrases };
}
