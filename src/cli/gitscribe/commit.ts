/**
 * gitscribe commit - Generate a commit message for the staged changes and commit
 */

import type { CommandModule } from 'yargs';
import {
  getConfigPath,
  loadEnvironment,
  readStoredConfig,
  requireProvider,
  resolveConfig,
} from '../../lib/config.js';
import type { GitscribeConfig } from '../../lib/config.js';
import { commitWithAI, createDefaultDeps } from '../../lib/commit/index.js';
import type { CommitDeps } from '../../lib/commit/index.js';
import * as colors from '../../lib/colors.js';
import {
  errorToDisplay,
  print,
  printCommitMessage,
  printError,
  printHeader,
  printStatus,
} from '../../lib/ui/index.js';

export interface CommitArgs {
  provider?: string;
  model?: string;
  yes?: boolean;
  date?: string;
  verbose?: boolean;
}

export interface RunCommitOptions {
  /** Environment to resolve settings from; process.env plus .env when omitted */
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  createDeps?: (config: GitscribeConfig) => CommitDeps;
}

/**
 * Run the commit command. Returns the process exit code.
 */
export async function runCommit(argv: CommitArgs, options: RunCommitOptions = {}): Promise<number> {
  try {
    if (!options.env) {
      loadEnvironment();
    }
    const env = options.env ?? process.env;

    const stored = readStoredConfig(options.configPath ?? getConfigPath(env));
    const config = resolveConfig({
      stored,
      env,
      overrides: { provider: argv.provider, model: argv.model },
    });
    const provider = requireProvider(config);
    const date = argv.date || config.defaultDate;

    const deps = (options.createDeps ?? createDefaultDeps)(config);
    const outcome = await commitWithAI(
      { provider, model: config.model, yes: argv.yes, date, verbose: argv.verbose },
      {
        ...deps,
        onDiffPreview: (preview) => {
          printHeader('Staged diff:');
          print(colors.dim(preview));
        },
        onMessage: (message) => printCommitMessage(message),
      }
    );

    if (outcome.status === 'cancelled') {
      printStatus('error', 'Commit cancelled');
      return 0;
    }

    printStatus(
      'success',
      outcome.date ? `Commit created (date: ${outcome.date})` : 'Commit created'
    );
    return 0;
  } catch (error) {
    printError(errorToDisplay(error));
    return 1;
  }
}

export const commitCommand: CommandModule<object, CommitArgs> = {
  command: ['commit', '$0'],
  describe: 'Generate a commit message for the staged changes and commit',
  builder: (yargs) => {
    return yargs
      .option('provider', {
        alias: 'p',
        type: 'string',
        description: 'Provider to use (deepseek, claude, ollama)',
      })
      .option('model', {
        alias: 'm',
        type: 'string',
        description: 'Model to request (ignored by ollama, see OLLAMA_MODEL)',
      })
      .option('yes', {
        alias: 'y',
        type: 'boolean',
        description: 'Commit without asking for confirmation',
        default: false,
      })
      .option('date', {
        alias: 'd',
        type: 'string',
        description: 'Commit date, passed to git commit --date',
      })
      .example('$0', 'Generate a message and confirm before committing')
      .example('$0 commit -p ollama -y', 'Use the local Ollama model and commit directly')
      .example('$0 commit --date "2024-01-01 12:00"', 'Commit with a fixed date');
  },
  handler: async (argv) => {
    const code = await runCommit(argv);
    if (code !== 0) {
      process.exit(code);
    }
  },
};
