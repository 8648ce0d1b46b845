export { ConfigSchema, ConfigDefaults, type RawConfig, type Config, type SigningConfig, type TransportKind } from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  expandTilde,
  maskSecrets,
  SIGNING_KEY_ENV,
  CORPUS_PATH_ENV,
  type LoadConfigOptions,
  type LoadConfigResult,
  ConfigError,
} from './loader.js';
