import { describe, it, expect, afterEach } from 'vitest';
import { loadConfig, defaultConfig, getConfig, resetConfig, ConfigError } from './config.js';

describe('loadConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.logging.level).toBe('info');
    expect(config.lexicon.emotionOverlayPath).toBeUndefined();
    expect(config.emotion).toEqual({ mixedMargin: 0.3, contrastWeight: 1.35, neutralMinHits: 2 });
    expect(config.domain.minReportScore).toBe(0.5);
    expect(config.engine).toEqual({
      domainHintThreshold: 0.45,
      variantCooldown: 6,
      familyCooldownWindow: 4,
      similarityThreshold: 0.45,
    });
  });

  it('reads tunables from the environment', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      EMOTION_LEXICON_PATH: '/tmp/emotion.json',
      MIXED_MARGIN: '0.22',
      VARIANT_COOLDOWN: '3',
      DOMAIN_MIN_SCORE: '1',
    });

    expect(config.logging.level).toBe('debug');
    expect(config.lexicon.emotionOverlayPath).toBe('/tmp/emotion.json');
    expect(config.emotion.mixedMargin).toBe(0.22);
    expect(config.engine.variantCooldown).toBe(3);
    expect(config.domain.minReportScore).toBe(1);
  });

  it('throws ConfigError listing every invalid key', () => {
    try {
      loadConfig({ LOG_LEVEL: 'loud', MIXED_MARGIN: '2', VARIANT_COOLDOWN: '1.5' });
      expect.unreachable('loadConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(3);
        expect(err.issues.some((issue) => issue.startsWith('logging.level:'))).toBe(true);
        expect(err.issues.some((issue) => issue.startsWith('emotion.mixedMargin:'))).toBe(true);
        expect(err.issues.some((issue) => issue.startsWith('engine.variantCooldown:'))).toBe(true);
      }
    }
  });

  it('rejects non-numeric values', () => {
    expect(() => loadConfig({ SIMILARITY_THRESHOLD: 'high' })).toThrow(ConfigError);
  });
});

describe('defaultConfig', () => {
  it('matches an environment with nothing set', () => {
    expect(defaultConfig()).toEqual(loadConfig({}));
  });
});

describe('getConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('caches until reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
