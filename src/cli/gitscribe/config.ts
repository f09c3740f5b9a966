/**
 * gitscribe config - Show or update the stored configuration
 */

import type { CommandModule } from 'yargs';
import { PROVIDER_NAMES } from '../../lib/constants.js';
import { getConfigPath, maskApiKey, readStoredConfig, writeStoredConfig } from '../../lib/config.js';
import type { StoredConfig } from '../../lib/config.js';
import { UnsupportedProviderError } from '../../lib/errors.js';
import { isProviderName } from '../../lib/ai/types.js';
import {
  errorToDisplay,
  printDetail,
  printDim,
  printError,
  printHeader,
  printStatus,
} from '../../lib/ui/index.js';

export interface ConfigArgs {
  'api-key'?: string;
  provider?: string;
  model?: string;
  'default-date'?: string;
  'ollama-host'?: string;
  'ollama-model'?: string;
  timeout?: number;
}

export interface RunConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

function showConfig(stored: StoredConfig, configPath: string): void {
  const show = (value: string | number | undefined): string =>
    value === undefined || value === '' ? 'not set' : String(value);

  printHeader('Current configuration');
  printDetail('API_KEY', stored.API_KEY ? maskApiKey(stored.API_KEY) : 'not set');
  printDetail('AI_PROVIDER', show(stored.AI_PROVIDER));
  printDetail('AI_MODEL', show(stored.AI_MODEL));
  printDetail('DEFAULT_DATE', show(stored.DEFAULT_DATE));
  printDetail('OLLAMA_HOST', show(stored.OLLAMA_HOST));
  printDetail('OLLAMA_MODEL', show(stored.OLLAMA_MODEL));
  printDetail('REQUEST_TIMEOUT_MS', show(stored.REQUEST_TIMEOUT_MS));
  printDim(`Config file: ${configPath}`, 2);
}

/**
 * Run the config command. Returns the process exit code.
 */
export function runConfig(argv: ConfigArgs, options: RunConfigOptions = {}): number {
  try {
    const configPath = options.configPath ?? getConfigPath(options.env);

    if (argv.provider !== undefined && !isProviderName(argv.provider)) {
      throw new UnsupportedProviderError(argv.provider, PROVIDER_NAMES);
    }

    const updates: StoredConfig = {
      API_KEY: argv['api-key'],
      AI_PROVIDER: argv.provider,
      AI_MODEL: argv.model,
      DEFAULT_DATE: argv['default-date'],
      OLLAMA_HOST: argv['ollama-host'],
      OLLAMA_MODEL: argv['ollama-model'],
      REQUEST_TIMEOUT_MS: argv.timeout,
    };

    if (Object.values(updates).every((value) => value === undefined)) {
      showConfig(readStoredConfig(configPath), configPath);
      return 0;
    }

    writeStoredConfig(updates, configPath);
    printStatus('success', 'Configuration updated');
    return 0;
  } catch (error) {
    printError(errorToDisplay(error));
    return 1;
  }
}

export const configCommand: CommandModule<object, ConfigArgs> = {
  command: 'config',
  describe: 'Show or update the stored configuration',
  builder: (yargs) => {
    return yargs
      .option('api-key', {
        type: 'string',
        description: 'API key for deepseek or claude',
      })
      .option('provider', {
        type: 'string',
        description: 'Default provider (deepseek, claude, ollama)',
      })
      .option('model', {
        type: 'string',
        description: 'Default model for deepseek or claude',
      })
      .option('default-date', {
        type: 'string',
        description: 'Date used for commits when --date is not given',
      })
      .option('ollama-host', {
        type: 'string',
        description: 'Base URL of the Ollama daemon',
      })
      .option('ollama-model', {
        type: 'string',
        description: 'Model requested from Ollama',
      })
      .option('timeout', {
        type: 'number',
        description: 'Request timeout in milliseconds (0 disables it)',
      })
      .example('$0 config', 'Show the current configuration')
      .example('$0 config --provider claude --api-key <key>', 'Use Claude by default');
  },
  handler: (argv) => {
    const code = runConfig(argv);
    if (code !== 0) {
      process.exit(code);
    }
  },
};
