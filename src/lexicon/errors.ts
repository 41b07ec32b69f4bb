/**
 * Thrown when built-in lexicon data, listening rules or prompt banks are
 * missing, malformed, or contain an invalid pattern.
 */
export class LexiconError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LexiconError';
  }
}
