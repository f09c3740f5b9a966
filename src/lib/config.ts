/**
 * Configuration loading for gitscribe
 *
 * Settings come from three places, merged in this order (later wins):
 *   ~/.gitscribe (JSON) ← environment / .env ← CLI flags
 *
 * The file uses the same upper-case keys as the environment variables, so a
 * value can be moved between the two without renaming it. The file is always
 * read and written whole.
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import AjvModule from 'ajv';
import type { ValidateFunction } from 'ajv';
import {
  CONFIG_PATH_ENV,
  DEFAULT_OLLAMA_HOST,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  PROVIDER_NAMES,
  getDefaultConfigPath,
} from './constants.js';
import { ConfigurationError, UnsupportedProviderError } from './errors.js';
import { isProviderName, type ProviderName } from './ai/types.js';
import { logger } from './logger.js';

const Ajv = AjvModule.default;

/**
 * Contents of the config file
 */
export interface StoredConfig {
  API_KEY?: string;
  AI_PROVIDER?: string;
  AI_MODEL?: string;
  DEFAULT_DATE?: string;
  OLLAMA_HOST?: string;
  OLLAMA_MODEL?: string;
  REQUEST_TIMEOUT_MS?: number;
}

/**
 * Effective settings for one invocation
 */
export interface GitscribeConfig {
  /** Provider name as given; checked by requireProvider() */
  provider?: string;
  /** Model for the remote providers */
  model?: string;
  apiKey?: string;
  defaultDate?: string;
  ollamaHost: string;
  ollamaModel: string;
  /** Request timeout in milliseconds, 0 disables it */
  timeoutMs: number;
}

/**
 * Values given on the command line
 */
export interface ConfigOverrides {
  provider?: string;
  model?: string;
}

const schemaUrl = new URL('../../schemas/config.schema.json', import.meta.url);

let validator: ValidateFunction<StoredConfig> | undefined;

function getValidator(): ValidateFunction<StoredConfig> {
  if (!validator) {
    const schema = JSON.parse(fs.readFileSync(schemaUrl, 'utf8'));
    const ajv = new Ajv({ allErrors: false });
    validator = ajv.compile<StoredConfig>(schema);
  }
  return validator;
}

/**
 * Get the config file path (GITSCRIBE_CONFIG overrides ~/.gitscribe)
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_PATH_ENV];
  return override ? path.resolve(override) : getDefaultConfigPath();
}

/**
 * Check a parsed config object against the JSON schema
 */
export function validateStoredConfig(value: unknown, configFile?: string): StoredConfig {
  const validate = getValidator();
  if (validate(value)) {
    return value;
  }

  const first = validate.errors?.[0];
  const field = first?.instancePath.replace(/^\//, '') || undefined;
  const where = configFile ? ` in ${configFile}` : '';
  const message = field
    ? `Invalid value for ${field}${where}: ${first?.message ?? 'invalid'}`
    : `Invalid configuration${where}: ${first?.message ?? 'invalid'}`;

  throw new ConfigurationError(message, { configFile, field });
}

/**
 * Read the config file. A missing file is an empty config.
 */
export function readStoredConfig(configPath: string = getConfigPath()): StoredConfig {
  if (!fs.existsSync(configPath)) {
    logger.debug(`No config file at ${configPath}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not parse ${configPath}: ${reason}`, {
      configFile: configPath,
    });
  }

  return validateStoredConfig(parsed, configPath);
}

/**
 * Merge updates into the config file and rewrite it.
 * Undefined fields in `updates` leave the stored value untouched.
 */
export function writeStoredConfig(
  updates: StoredConfig,
  configPath: string = getConfigPath()
): StoredConfig {
  const current = readStoredConfig(configPath);
  const defined = Object.fromEntries(
    Object.entries(updates).filter(([, value]) => value !== undefined)
  );
  const merged = validateStoredConfig({ ...current, ...defined }, configPath);

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(merged, null, 2) + '\n', { mode: 0o600 });
  logger.debug(`Wrote config to ${configPath}`);

  return merged;
}

/**
 * Load a .env file from the working directory into process.env.
 * Variables that are already set are not overridden.
 */
export function loadEnvironment(cwd: string = process.cwd()): void {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) {
    return;
  }

  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new ConfigurationError(`Could not load ${envPath}: ${result.error.message}`, {
      configFile: envPath,
    });
  }
  logger.debug(`Loaded environment from ${envPath}`);
}

function firstSet(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '');
}

function parseTimeout(raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(
      `REQUEST_TIMEOUT_MS must be a non-negative integer, got "${raw}"`,
      { field: 'REQUEST_TIMEOUT_MS' }
    );
  }
  return parseInt(raw, 10);
}

/**
 * Merge stored config, environment and CLI overrides into the effective config
 */
export function resolveConfig(
  options: { stored?: StoredConfig; env?: NodeJS.ProcessEnv; overrides?: ConfigOverrides } = {}
): GitscribeConfig {
  const stored = options.stored ?? {};
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const envTimeout = firstSet(env.REQUEST_TIMEOUT_MS);

  return {
    provider: firstSet(overrides.provider, env.AI_PROVIDER, stored.AI_PROVIDER),
    model: firstSet(overrides.model, env.AI_MODEL, stored.AI_MODEL),
    apiKey: firstSet(env.API_KEY, stored.API_KEY),
    defaultDate: firstSet(env.DEFAULT_DATE, stored.DEFAULT_DATE),
    ollamaHost: firstSet(env.OLLAMA_HOST, stored.OLLAMA_HOST) ?? DEFAULT_OLLAMA_HOST,
    ollamaModel: firstSet(env.OLLAMA_MODEL, stored.OLLAMA_MODEL) ?? DEFAULT_OLLAMA_MODEL,
    timeoutMs:
      envTimeout !== undefined
        ? parseTimeout(envTimeout)
        : (stored.REQUEST_TIMEOUT_MS ?? DEFAULT_REQUEST_TIMEOUT_MS),
  };
}

/**
 * Return the configured provider name, or fail when none is set or it is
 * not a supported provider
 */
export function requireProvider(config: GitscribeConfig): ProviderName {
  if (!config.provider) {
    throw new ConfigurationError(
      `No provider configured. Valid options: ${PROVIDER_NAMES.join(', ')}`,
      { field: 'AI_PROVIDER' }
    );
  }
  if (!isProviderName(config.provider)) {
    throw new UnsupportedProviderError(config.provider, PROVIDER_NAMES);
  }
  return config.provider;
}

/**
 * Hide all but the edges of an API key for display
 */
export function maskApiKey(key: string): string {
  if (key.length <= 8) {
    return '****';
  }
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}
