/**
 * Claude provider
 *
 * Calls the Anthropic Messages API through the official SDK.
 */

import Anthropic from '@anthropic-ai/sdk';
import {
  DEFAULT_CLAUDE_MODEL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  GENERATION_MAX_TOKENS,
  MAX_TIMER_DELAY_MS,
  GENERATION_TEMPERATURE,
} from '../constants.js';
import { MissingCredentialError, ProviderResponseError } from '../errors.js';
import { BaseCommitProvider } from './base-provider.js';
import type { ProviderSettings } from './types.js';

export interface ClaudeMessageRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface ClaudeMessageResponse {
  content: Array<{ type: string; text?: string }>;
}

/**
 * The part of the SDK client the provider uses
 */
export interface ClaudeMessagesClient {
  create(request: ClaudeMessageRequest): Promise<ClaudeMessageResponse>;
}

export interface ClaudeProviderOptions extends ProviderSettings {
  /** Model used when generate() is not given one */
  model?: string;
  /** Messages client, replaced in tests */
  client?: ClaudeMessagesClient;
}

export interface ClaudeClientOptions {
  apiKey: string;
  timeout: number;
  maxRetries: number;
}

/**
 * SDK client options. A timeout of 0 means no timeout, which the SDK can
 * only express as the longest timer delay.
 */
export function claudeClientOptions(apiKey: string, timeoutMs: number): ClaudeClientOptions {
  return {
    apiKey,
    timeout: timeoutMs > 0 ? timeoutMs : MAX_TIMER_DELAY_MS,
    maxRetries: 0,
  };
}

function createSdkClient(apiKey: string, timeoutMs: number): ClaudeMessagesClient {
  const anthropic = new Anthropic(claudeClientOptions(apiKey, timeoutMs));
  return {
    create: (request) => anthropic.messages.create(request),
  };
}

export class ClaudeProvider extends BaseCommitProvider {
  readonly name = 'claude' as const;
  protected readonly defaultModel: string;

  private readonly client: ClaudeMessagesClient;

  constructor(options: ClaudeProviderOptions = {}) {
    super();
    if (!options.apiKey) {
      throw new MissingCredentialError('claude');
    }
    this.defaultModel = options.model || DEFAULT_CLAUDE_MODEL;
    this.client =
      options.client ??
      createSdkClient(options.apiKey, options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
  }

  protected async complete(prompt: string, model: string): Promise<string> {
    let response: ClaudeMessageResponse;
    try {
      response = await this.client.create({
        model,
        max_tokens: GENERATION_MAX_TOKENS,
        temperature: GENERATION_TEMPERATURE,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderResponseError(`Claude API request failed: ${reason}`, {
        provider: this.name,
        status: error instanceof Anthropic.APIError ? error.status : undefined,
      });
    }

    const block = response.content.find((item) => item.type === 'text');
    if (typeof block?.text !== 'string') {
      throw new ProviderResponseError('Claude API response has no text block', {
        provider: this.name,
      });
    }

    return block.text;
  }
}
