export {
  configSchema,
  loadConfig,
  defaultConfig,
  getConfig,
  resetConfig,
  ConfigError,
  type Config,
  type LoggingConfig,
  type LexiconConfig,
  type EmotionConfig,
  type DomainConfig,
  type EngineConfig,
} from './config.js';
