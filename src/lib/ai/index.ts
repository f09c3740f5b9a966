/**
 * Commit message providers
 */

export * from './types.js';
export * from './prompt.js';
export { BaseCommitProvider } from './base-provider.js';
export { DeepSeekProvider } from './deepseek-provider.js';
export type { DeepSeekProviderOptions } from './deepseek-provider.js';
export { ClaudeProvider } from './claude-provider.js';
export type {
  ClaudeMessagesClient,
  ClaudeMessageRequest,
  ClaudeMessageResponse,
  ClaudeProviderOptions,
} from './claude-provider.js';
export { OllamaProvider, matchesModel } from './ollama-provider.js';
export type { OllamaProviderOptions } from './ollama-provider.js';
export { ProviderRegistry, PROVIDER_FACTORIES, createProviderRegistry } from './provider-registry.js';
export type { ProviderFactory } from './provider-registry.js';
