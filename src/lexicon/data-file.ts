import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { z } from 'zod';
import { LexiconError } from './errors.js';

/** Directory holding the bundled JSON data, next to src/ and dist/ */
export const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

export function dataFilePath(name: string): string {
  return path.join(DATA_DIR, name);
}

/**
 * Render zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`);
}

/**
 * Read and validate a JSON data file.
 * @throws LexiconError if the file is missing, not JSON, or fails the schema
 */
export function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new LexiconError(`Cannot read ${filePath}`, filePath, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new LexiconError(`Invalid JSON in ${filePath}`, filePath, { cause: err });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new LexiconError(`Invalid data in ${filePath}:\n${formatIssues(result.error).join('\n')}`, filePath);
  }

  return result.data;
}

/**
 * Compile a case-insensitive pattern from data.
 * @throws LexiconError naming the offending source
 */
export function compilePattern(source: string, origin: string, flags = 'i'): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    throw new LexiconError(`Invalid pattern ${JSON.stringify(source)} in ${origin}`, origin, { cause: err });
  }
}
