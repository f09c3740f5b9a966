/**
 * gitscribe - Conventional Commit messages from staged diffs
 *
 * Library entry point. The CLI lives in src/cli/gitscribe.ts.
 */

export * from './lib/errors.js';
export * from './lib/ai/index.js';
export * from './lib/commit/index.js';
export {
  getConfigPath,
  readStoredConfig,
  writeStoredConfig,
  resolveConfig,
  requireProvider,
  maskApiKey,
  loadEnvironment,
  validateStoredConfig,
} from './lib/config.js';
export type { StoredConfig, GitscribeConfig, ConfigOverrides } from './lib/config.js';
export { getStagedDiff, commit } from './lib/git.js';
export type { CommitOptions } from './lib/git.js';
export { logger, initializeLogger } from './lib/logger.js';
