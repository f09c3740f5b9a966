/**
 * DeepSeek provider
 *
 * Calls the DeepSeek chat completions API with a bearer key.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import {
  DEEPSEEK_API_URL,
  DEFAULT_DEEPSEEK_MODEL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  GENERATION_MAX_TOKENS,
  GENERATION_TEMPERATURE,
} from '../constants.js';
import {
  MissingCredentialError,
  ProviderConnectionError,
  ProviderResponseError,
} from '../errors.js';
import { BaseCommitProvider, describeBody, isRecord } from './base-provider.js';
import type { ProviderSettings } from './types.js';

export interface DeepSeekProviderOptions extends ProviderSettings {
  /** Model used when generate() is not given one */
  model?: string;
  /** HTTP client, replaced in tests */
  httpClient?: AxiosInstance;
}

/**
 * Pull `choices[0].message.content` out of a chat completions body
 */
function extractContent(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    return undefined;
  }
  const [first] = body.choices;
  if (!isRecord(first) || !isRecord(first.message)) {
    return undefined;
  }
  const content = first.message.content;
  return typeof content === 'string' ? content : undefined;
}

export class DeepSeekProvider extends BaseCommitProvider {
  readonly name = 'deepseek' as const;
  protected readonly defaultModel: string;

  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: DeepSeekProviderOptions = {}) {
    super();
    if (!options.apiKey) {
      throw new MissingCredentialError('deepseek');
    }
    this.apiKey = options.apiKey;
    this.defaultModel = options.model || DEFAULT_DEEPSEEK_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.http = options.httpClient ?? axios.create();
  }

  protected async complete(prompt: string, model: string): Promise<string> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(
        DEEPSEEK_API_URL,
        {
          model,
          messages: [{ role: 'user', content: prompt }],
          temperature: GENERATION_TEMPERATURE,
          max_tokens: GENERATION_MAX_TOKENS,
        },
        {
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
          },
          timeout: this.timeoutMs,
          validateStatus: () => true,
        }
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderConnectionError(`Could not reach the DeepSeek API: ${reason}`, {
        provider: this.name,
        url: DEEPSEEK_API_URL,
        cause: error,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new ProviderResponseError(`DeepSeek API returned status ${response.status}`, {
        provider: this.name,
        status: response.status,
        body: describeBody(response.data),
      });
    }

    const content = extractContent(response.data);
    if (content === undefined) {
      throw new ProviderResponseError('DeepSeek API response has no message content', {
        provider: this.name,
        status: response.status,
        body: describeBody(response.data),
      });
    }

    return content;
  }
}
