/**
 * Provider types and interfaces
 *
 * Defines the contract every commit message generator implements.
 */

import { PROVIDER_NAMES } from '../constants.js';

/**
 * Registered provider identifiers
 */
export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * Check whether a string names a registered provider
 */
export function isProviderName(name: string): name is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(name);
}

/**
 * Per-call generation options
 */
export interface GenerateOptions {
  /** Model to use; the provider's default when omitted */
  model?: string;
}

/**
 * Commit message provider interface
 *
 * Each backend (DeepSeek, Claude, Ollama) implements this. `generate` resolves
 * with the trimmed message or rejects with a ProviderError.
 */
export interface CommitMessageProvider {
  /** Provider name for identification */
  readonly name: ProviderName;

  /** Generate a commit message for a staged diff */
  generate(diff: string, options?: GenerateOptions): Promise<string>;
}

/**
 * Settings every provider is built from
 */
export interface ProviderSettings {
  apiKey?: string;
  /** Request timeout in milliseconds, 0 disables it */
  timeoutMs?: number;
  /** Base URL of the local Ollama daemon */
  ollamaHost?: string;
  /** Model requested from the local Ollama daemon */
  ollamaModel?: string;
}
