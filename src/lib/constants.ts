/**
 * Centralized constants and defaults for gitscribe
 */

import os from 'os';
import path from 'path';

/**
 * Package name, used for the binary and log prefixes
 */
export const PACKAGE_NAME = 'gitscribe';

/**
 * Config file name in the user's home directory
 */
export const CONFIG_FILE_NAME = '.gitscribe';

/**
 * Environment variable that overrides the config file location
 */
export const CONFIG_PATH_ENV = 'GITSCRIBE_CONFIG';

/**
 * Get the per-user config file path
 */
export function getDefaultConfigPath(): string {
  return path.join(os.homedir(), CONFIG_FILE_NAME);
}

/**
 * Identifiers of the supported generation backends
 */
export const PROVIDER_NAMES = ['deepseek', 'claude', 'ollama'] as const;

/**
 * Conventional Commits types accepted in a message header
 */
export const COMMIT_TYPES = [
  'feat',
  'fix',
  'docs',
  'style',
  'refactor',
  'perf',
  'test',
  'chore',
  'build',
  'ci',
  'revert',
] as const;

export type CommitType = (typeof COMMIT_TYPES)[number];

/**
 * DeepSeek chat completions endpoint
 */
export const DEEPSEEK_API_URL = 'https://api.deepseek.com/v1/chat/completions';

/**
 * Default model for each remote provider
 */
export const DEFAULT_DEEPSEEK_MODEL = 'deepseek-chat';
export const DEFAULT_CLAUDE_MODEL = 'claude-3-haiku-20240307';

/**
 * Local Ollama daemon defaults
 */
export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'codellama:13b';

/**
 * Sampling parameters shared by every provider
 */
export const GENERATION_TEMPERATURE = 0.3;
export const GENERATION_MAX_TOKENS = 100;

/**
 * Request timeout in milliseconds (0 disables it)
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 60000;

/**
 * Timeout for the Ollama liveness and model-list checks
 */
export const PREFLIGHT_TIMEOUT_MS = 5000;

/**
 * Largest delay a Node.js timer accepts. Stands in for "no timeout" where a
 * client treats 0 or undefined as "use my default".
 */
export const MAX_TIMER_DELAY_MS = 2147483647;

/**
 * Maximum number of response body characters kept on a ProviderResponseError
 */
export const MAX_ERROR_BODY_LENGTH = 500;

/**
 * Number of diff characters echoed by `commit --verbose`
 */
export const DIFF_PREVIEW_LENGTH = 500;

/**
 * Log level values (consola numeric levels)
 */
export const LogLevel = {
  SILENT: -999,
  ERROR: 0,
  WARN: 1,
  INFO: 3,
  DEBUG: 4,
  TRACE: 5,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Environment variables read by the logger
 */
export const LOG_LEVEL_ENV = 'GITSCRIBE_LOG_LEVEL';
export const LOG_FILE_ENV = 'GITSCRIBE_LOG_FILE';
