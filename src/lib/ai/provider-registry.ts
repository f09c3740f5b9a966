/**
 * Provider registry
 *
 * Static mapping from provider name to factory. Providers are built on
 * resolve(), so a missing API key only fails for the provider in use.
 */

import { PROVIDER_NAMES } from '../constants.js';
import { UnsupportedProviderError } from '../errors.js';
import type { GitscribeConfig } from '../config.js';
import { ClaudeProvider } from './claude-provider.js';
import { DeepSeekProvider } from './deepseek-provider.js';
import { OllamaProvider } from './ollama-provider.js';
import { isProviderName } from './types.js';
import type { CommitMessageProvider, ProviderName, ProviderSettings } from './types.js';

export type ProviderFactory = (settings: ProviderSettings) => CommitMessageProvider;

export const PROVIDER_FACTORIES: Record<ProviderName, ProviderFactory> = {
  deepseek: (settings) => new DeepSeekProvider(settings),
  claude: (settings) => new ClaudeProvider(settings),
  ollama: (settings) => new OllamaProvider(settings),
};

export class ProviderRegistry {
  private readonly settings: ProviderSettings;
  private readonly factories: Record<ProviderName, ProviderFactory>;

  constructor(
    settings: ProviderSettings = {},
    factories: Record<ProviderName, ProviderFactory> = PROVIDER_FACTORIES
  ) {
    this.settings = settings;
    this.factories = factories;
  }

  /**
   * Supported provider names, in display order
   */
  names(): readonly ProviderName[] {
    return PROVIDER_NAMES;
  }

  isSupportedProvider(name: string): name is ProviderName {
    return isProviderName(name);
  }

  /**
   * Build the provider registered under `name`.
   * Construction errors (such as a missing key) propagate unchanged.
   */
  resolve(name: string): CommitMessageProvider {
    if (!isProviderName(name)) {
      throw new UnsupportedProviderError(name, PROVIDER_NAMES);
    }
    return this.factories[name](this.settings);
  }
}

/**
 * Create a registry whose providers are built from the effective config
 */
export function createProviderRegistry(config: GitscribeConfig): ProviderRegistry {
  return new ProviderRegistry({
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
    ollamaHost: config.ollamaHost,
    ollamaModel: config.ollamaModel,
  });
}
