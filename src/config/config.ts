import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

// Logging configuration schema
const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

// Optional JSON overlays merged on top of the built-in lexicons
const lexiconSchema = z.object({
  emotionOverlayPath: z.string().min(1).optional(),
  domainOverlayPath: z.string().min(1).optional(),
});

// Emotion classifier tunables
const emotionSchema = z.object({
  mixedMargin: z.number().min(0).max(1).default(0.3),
  contrastWeight: z.number().min(1).default(1.35),
  neutralMinHits: z.number().int().min(0).default(2),
});

// Domain classifier tunables
const domainSchema = z.object({
  minReportScore: z.number().min(0).default(0.5),
});

// Listening engine tunables
const engineSchema = z.object({
  domainHintThreshold: z.number().min(0).max(1).default(0.45),
  variantCooldown: z.number().int().positive().default(6),
  familyCooldownWindow: z.number().int().positive().default(4),
  similarityThreshold: z.number().min(0).max(1).default(0.45),
});

// Main configuration schema
export const configSchema = z.object({
  logging: loggingSchema.default({ level: 'info' }),
  lexicon: lexiconSchema.default({}),
  emotion: emotionSchema.default({ mixedMargin: 0.3, contrastWeight: 1.35, neutralMinHits: 2 }),
  domain: domainSchema.default({ minReportScore: 0.5 }),
  engine: engineSchema.default({
    domainHintThreshold: 0.45,
    variantCooldown: 6,
    familyCooldownWindow: 4,
    similarityThreshold: 0.45,
  }),
});

// Type inference from schema
export type Config = z.infer<typeof configSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;
export type LexiconConfig = z.infer<typeof lexiconSchema>;
export type EmotionConfig = z.infer<typeof emotionSchema>;
export type DomainConfig = z.infer<typeof domainSchema>;
export type EngineConfig = z.infer<typeof engineSchema>;

/**
 * Thrown when environment configuration fails validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function floatFromEnv(value: string | undefined): number | undefined {
  return value ? parseFloat(value) : undefined;
}

function intFromEnv(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

/**
 * Load configuration from environment variables
 * @returns Validated configuration object
 * @throws ConfigError if configuration is invalid
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
    lexicon: {
      emotionOverlayPath: env.EMOTION_LEXICON_PATH || undefined,
      domainOverlayPath: env.DOMAIN_LEXICON_PATH || undefined,
    },
    emotion: {
      mixedMargin: floatFromEnv(env.MIXED_MARGIN),
      contrastWeight: floatFromEnv(env.CONTRAST_WEIGHT),
      neutralMinHits: intFromEnv(env.NEUTRAL_MIN_HITS),
    },
    domain: {
      minReportScore: floatFromEnv(env.DOMAIN_MIN_SCORE),
    },
    engine: {
      domainHintThreshold: floatFromEnv(env.DOMAIN_HINT_THRESHOLD),
      variantCooldown: intFromEnv(env.VARIANT_COOLDOWN),
      familyCooldownWindow: intFromEnv(env.FAMILY_COOLDOWN_WINDOW),
      similarityThreshold: floatFromEnv(env.SIMILARITY_THRESHOLD),
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, issues);
  }

  return result.data;
}

/**
 * Configuration with every default applied, ignoring the environment.
 */
export function defaultConfig(): Config {
  return configSchema.parse({});
}

// Export a singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
