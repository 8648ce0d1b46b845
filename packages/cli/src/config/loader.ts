import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { ConfigSchema, ConfigDefaults, type Config } from './schema.js';

const DEFAULT_CONFIG_PATH = '.newsdesk/config.yaml';

export const SIGNING_KEY_ENV = 'NEWSDESK_SIGNING_KEY';
export const CORPUS_PATH_ENV = 'NEWSDESK_CORPUS_PATH';

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.slice(4);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envKey = value.slice(2, -1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envKey = value.slice(1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

/**
 * Apply environment variable fallbacks.
 * Unresolved env refs (e.g. "env:NEWSDESK_SIGNING_KEY" with the variable unset) are cleared first.
 */
function applyEnvVarFallbacks(config: Config, corpusPathFromFile: boolean): void {
  if (isUnresolvedEnvRef(config.signing.private_key)) {
    config.signing.private_key = undefined;
  }
  if (isUnresolvedEnvRef(config.signing.private_key_path)) {
    config.signing.private_key_path = undefined;
  }

  if (!config.signing.private_key && !config.signing.private_key_path) {
    const envKey = process.env[SIGNING_KEY_ENV];
    if (envKey) {
      config.signing.private_key = envKey;
    }
  }

  if (!corpusPathFromFile || isUnresolvedEnvRef(config.corpus.path)) {
    const envPath = process.env[CORPUS_PATH_ENV];
    config.corpus.path = envPath ? envPath : ConfigDefaults.corpus.path;
  }
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  const result: Config = structuredClone(ConfigDefaults);
  let corpusPathFromFile = false;

  if (configFileExists) {
    let fileContent: string;
    try {
      fileContent = readFileSync(configPath, 'utf-8');
    } catch {
      throw new ConfigError(`Failed to read config file: ${configPath}`);
    }

    let rawConfig: unknown;
    try {
      rawConfig = parse(fileContent);
    } catch {
      throw new ConfigError(`Failed to parse config file: ${configPath}`);
    }

    if (rawConfig !== null && rawConfig !== undefined) {
      const resolvedConfig = resolveEnvVarsInObject(stripNullValues(rawConfig));
      const validated = ConfigSchema.safeParse(resolvedConfig);

      if (!validated.success) {
        throw new ConfigError(`Invalid config: ${formatIssues(validated.error.issues)}`);
      }

      const data = validated.data;
      if (data.corpus?.path) {
        result.corpus.path = data.corpus.path;
        corpusPathFromFile = true;
      }
      if (data.signing) {
        result.signing = {
          ...result.signing,
          ...data.signing,
          public_keys: { ...result.signing.public_keys, ...data.signing.public_keys },
        };
      }
      if (data.server) {
        result.server = { ...result.server, ...data.server };
      }
      if (data.tools?.enabled) {
        result.tools.enabled = data.tools.enabled;
      }
      if (data.query) {
        result.query = { ...result.query, ...data.query };
      }
    }
  }

  // Track which env vars supply values (before applying fallbacks)
  const envKeysUsed: string[] = [];
  if (!result.signing.private_key && !result.signing.private_key_path && process.env[SIGNING_KEY_ENV]) {
    envKeysUsed.push(SIGNING_KEY_ENV);
  }
  if (!corpusPathFromFile && process.env[CORPUS_PATH_ENV]) {
    envKeysUsed.push(CORPUS_PATH_ENV);
  }

  applyEnvVarFallbacks(result, corpusPathFromFile);

  return { config: result, configFileExists, envKeysUsed };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

const MASK = '********';

/** Copy of the config safe to print: private key material is masked. */
export function maskSecrets(config: Config): Config {
  const masked = structuredClone(config);
  if (masked.signing.private_key) {
    masked.signing.private_key = MASK;
  }
  return masked;
}
