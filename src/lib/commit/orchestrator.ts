/**
 * Commit orchestration
 *
 * staged diff → provider → generated message → confirmation → git commit
 *
 * Every side effect goes through CommitDeps so the flow can be tested
 * without git, a network or a terminal.
 */

import { DIFF_PREVIEW_LENGTH } from '../constants.js';
import { DiffUnavailableError } from '../errors.js';
import * as git from '../git.js';
import { logger } from '../logger.js';
import { promptConfirm, withSpinner } from '../prompts.js';
import type { GitscribeConfig } from '../config.js';
import { createProviderRegistry } from '../ai/provider-registry.js';
import type { CommitMessageProvider } from '../ai/types.js';
import { isValidConventionalCommit } from './validator.js';

/**
 * Side effects used by commitWithAI
 */
export interface CommitDeps {
  getStagedDiff: () => string;
  resolveProvider: (name: string) => CommitMessageProvider;
  /** Ask whether to commit with the shown message */
  confirm: (message: string) => Promise<boolean>;
  commit: (options: git.CommitOptions) => void;
  /** Wraps the generation call, e.g. with a spinner */
  withProgress?: <T>(label: string, operation: () => Promise<T>) => Promise<T>;
  /** Called once the message is known, before confirmation */
  onMessage?: (message: string, conventional: boolean) => void;
  /** Called with the diff preview in verbose mode */
  onDiffPreview?: (preview: string) => void;
}

export interface CommitRequest {
  provider: string;
  /** Ignored by the ollama provider, which uses its configured model */
  model?: string;
  /** Skip confirmation */
  yes?: boolean;
  date?: string;
  verbose?: boolean;
}

export type CommitOutcome =
  | { status: 'committed'; message: string; date?: string }
  | { status: 'cancelled'; message: string };

/**
 * The first characters of a diff, as echoed in verbose mode
 */
export function previewDiff(diff: string, length: number = DIFF_PREVIEW_LENGTH): string {
  return `${diff.slice(0, length)}...`;
}

/**
 * Generate a commit message for the staged changes and commit with it
 */
export async function commitWithAI(request: CommitRequest, deps: CommitDeps): Promise<CommitOutcome> {
  const diff = deps.getStagedDiff();
  if (!diff.trim()) {
    throw new DiffUnavailableError('No staged changes found', {
      command: 'git diff --staged',
      nothingStaged: true,
    });
  }
  logger.debug(`Staged diff: ${diff.length} chars`);

  if (request.verbose) {
    deps.onDiffPreview?.(previewDiff(diff));
  }

  const provider = deps.resolveProvider(request.provider);

  let model = request.model;
  if (provider.name === 'ollama' && model) {
    logger.debug(`Ignoring model "${model}" for ollama; using the configured Ollama model`);
    model = undefined;
  }

  const run = (): Promise<string> => provider.generate(diff, { model });
  const label = `Generating commit message with ${provider.name}...`;
  const message = deps.withProgress ? await deps.withProgress(label, run) : await run();

  const conventional = isValidConventionalCommit(message);
  if (!conventional) {
    logger.warn('The generated message does not follow Conventional Commits');
  }
  deps.onMessage?.(message, conventional);

  if (!request.yes && !(await deps.confirm(message))) {
    logger.debug('Commit declined');
    return { status: 'cancelled', message };
  }

  deps.commit({ message, date: request.date });
  logger.debug(`Committed with ${provider.name}${request.date ? ` (date: ${request.date})` : ''}`);

  return { status: 'committed', message, date: request.date };
}

/**
 * Real dependencies: git on the working directory, providers built from config,
 * an interactive confirmation and a spinner
 */
export function createDefaultDeps(config: GitscribeConfig, cwd?: string): CommitDeps {
  const registry = createProviderRegistry(config);
  return {
    getStagedDiff: () => git.getStagedDiff(cwd),
    resolveProvider: (name) => registry.resolve(name),
    confirm: () => promptConfirm('Commit with this message?', false),
    commit: (options) => git.commit({ ...options, cwd }),
    withProgress: withSpinner,
  };
}
