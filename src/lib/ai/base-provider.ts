/**
 * Base provider implementation
 *
 * Owns the steps every provider shares: pick the model, build the prompt,
 * call the backend, trim the result. Subclasses supply the transport.
 */

import { MAX_ERROR_BODY_LENGTH } from '../constants.js';
import { logger } from '../logger.js';
import { buildCommitPrompt } from './prompt.js';
import type { CommitMessageProvider, GenerateOptions, ProviderName } from './types.js';

/**
 * Narrow an unknown JSON value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render a response body for an error message, truncated
 */
export function describeBody(body: unknown, maxLength = MAX_ERROR_BODY_LENGTH): string {
  let text: string;
  if (typeof body === 'string') {
    text = body;
  } else if (body === undefined) {
    text = '';
  } else {
    try {
      text = JSON.stringify(body);
    } catch {
      text = String(body);
    }
  }
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Join a base URL and an API path without doubling slashes
 */
export function joinUrl(base: string, apiPath: string): string {
  return `${base.replace(/\/+$/, '')}/${apiPath.replace(/^\/+/, '')}`;
}

/**
 * Abstract base class for commit message providers
 */
export abstract class BaseCommitProvider implements CommitMessageProvider {
  abstract readonly name: ProviderName;

  /** Model used when the caller does not pick one */
  protected abstract readonly defaultModel: string;

  /**
   * Send the prompt to the backend and return the raw completion text
   */
  protected abstract complete(prompt: string, model: string): Promise<string>;

  /**
   * Checks run before the prompt is sent. Nothing by default.
   */
  protected async preflight(_model: string): Promise<void> {}

  /**
   * Inspect the trimmed completion. Returns it unchanged by default.
   */
  protected checkOutput(message: string): string {
    return message;
  }

  async generate(diff: string, options: GenerateOptions = {}): Promise<string> {
    const model = options.model || this.defaultModel;

    await this.preflight(model);

    logger.debug(`Requesting commit message from ${this.name} (model: ${model}, diff: ${diff.length} chars)`);
    const completion = await this.complete(buildCommitPrompt(diff), model);
    const message = this.checkOutput(completion.trim());
    logger.debug(`${this.name} returned ${message.length} chars`);

    return message;
  }
}
