/**
 * Ollama provider
 *
 * Talks to a local Ollama daemon. Before generating it checks that the
 * daemon answers and that the model is installed, so a missing model is
 * reported as such rather than as a failed request.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import {
  DEFAULT_OLLAMA_HOST,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  PREFLIGHT_TIMEOUT_MS,
} from '../constants.js';
import {
  MalformedGenerationError,
  ModelNotFoundError,
  ProviderConnectionError,
  ProviderResponseError,
  ProviderUnavailableError,
} from '../errors.js';
import { logger } from '../logger.js';
import { hasConventionalPrefix } from '../commit/validator.js';
import { BaseCommitProvider, describeBody, isRecord, joinUrl } from './base-provider.js';
import type { ProviderSettings } from './types.js';

export interface OllamaProviderOptions extends ProviderSettings {
  /** HTTP client, replaced in tests */
  httpClient?: AxiosInstance;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Check whether an installed model name satisfies the requested one.
 * An untagged request also matches the `:latest` tag.
 */
export function matchesModel(installed: string, requested: string): boolean {
  if (installed === requested) {
    return true;
  }
  return !requested.includes(':') && installed === `${requested}:latest`;
}

/**
 * Read `models[].name` from an /api/tags body
 */
function extractModelNames(body: unknown): string[] | undefined {
  if (!isRecord(body) || !Array.isArray(body.models)) {
    return undefined;
  }
  const names: string[] = [];
  for (const entry of body.models) {
    if (isRecord(entry) && typeof entry.name === 'string') {
      names.push(entry.name);
    }
  }
  return names;
}

export class OllamaProvider extends BaseCommitProvider {
  readonly name = 'ollama' as const;
  protected readonly defaultModel: string;

  readonly host: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: OllamaProviderOptions = {}) {
    super();
    this.host = options.ollamaHost || DEFAULT_OLLAMA_HOST;
    this.defaultModel = options.ollamaModel || DEFAULT_OLLAMA_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.http = options.httpClient ?? axios.create();
  }

  private unavailable(reason: string): ProviderUnavailableError {
    return new ProviderUnavailableError(`Ollama is not reachable at ${this.host} (${reason})`, {
      provider: this.name,
      host: this.host,
      remediation: 'Start the daemon with "ollama serve", or set OLLAMA_HOST',
    });
  }

  protected async preflight(model: string): Promise<void> {
    const versionUrl = joinUrl(this.host, '/api/version');
    let version: AxiosResponse<unknown>;
    try {
      version = await this.http.get<unknown>(versionUrl, {
        timeout: PREFLIGHT_TIMEOUT_MS,
        validateStatus: () => true,
      });
    } catch (error) {
      throw this.unavailable(error instanceof Error ? error.message : String(error));
    }
    if (!isSuccess(version.status)) {
      throw this.unavailable(`status ${version.status}`);
    }

    const tagsUrl = joinUrl(this.host, '/api/tags');
    let tags: AxiosResponse<unknown>;
    try {
      tags = await this.http.get<unknown>(tagsUrl, {
        timeout: PREFLIGHT_TIMEOUT_MS,
        validateStatus: () => true,
      });
    } catch (error) {
      throw this.unavailable(error instanceof Error ? error.message : String(error));
    }

    const installed = isSuccess(tags.status) ? extractModelNames(tags.data) : undefined;
    if (installed === undefined) {
      throw new ProviderResponseError('Could not list installed Ollama models', {
        provider: this.name,
        status: tags.status,
        body: describeBody(tags.data),
      });
    }

    logger.debug(`Ollama models installed: ${installed.join(', ') || '(none)'}`);
    if (!installed.some((name) => matchesModel(name, model))) {
      throw new ModelNotFoundError(model, { provider: this.name, available: installed });
    }
  }

  protected async complete(prompt: string, model: string): Promise<string> {
    const url = joinUrl(this.host, '/api/generate');
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(
        url,
        { model, prompt, stream: false },
        { timeout: this.timeoutMs, validateStatus: () => true }
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderConnectionError(`Ollama request failed: ${reason}`, {
        provider: this.name,
        url,
        cause: error,
      });
    }

    if (!isSuccess(response.status)) {
      throw new ProviderResponseError(`Ollama returned status ${response.status}`, {
        provider: this.name,
        status: response.status,
        body: describeBody(response.data),
      });
    }

    const body = response.data;
    if (!isRecord(body) || typeof body.response !== 'string') {
      throw new ProviderResponseError('Ollama response has no generated text', {
        provider: this.name,
        status: response.status,
        body: describeBody(body),
      });
    }

    return body.response;
  }

  protected checkOutput(message: string): string {
    if (!message) {
      throw new MalformedGenerationError('Ollama returned an empty message', {
        provider: this.name,
        rawText: message,
      });
    }
    if (!hasConventionalPrefix(message)) {
      throw new MalformedGenerationError(
        'Ollama response does not start with a commit type',
        { provider: this.name, rawText: message }
      );
    }
    return message;
  }
}
