/**
 * Structured error display.
 *
 * Every command catches its error once and hands it to
 * errorToDisplay() -> printError().
 */

import * as colors from '../colors.js';
import {
  ConfigurationError,
  DiffUnavailableError,
  GitCommandError,
  MalformedGenerationError,
  MissingCredentialError,
  ModelNotFoundError,
  ProviderConnectionError,
  ProviderResponseError,
  ProviderUnavailableError,
  UnsupportedProviderError,
} from '../errors.js';
import { printErr } from './output.js';

export interface ErrorDisplayOptions {
  title: string;
  detail?: string;
  hint?: string;
}

/**
 * Display a structured error to stderr.
 *
 * Output format:
 * ```
 * ✗ {title}                    <- via colors.status()
 *   {detail}                   <- plain text, only if provided
 *   Hint: {hint}               <- via colors.dim(), only if provided
 * ```
 */
export function printError(options: ErrorDisplayOptions): void {
  printErr(colors.status('error', options.title));
  if (options.detail) {
    printErr(`  ${options.detail}`);
  }
  if (options.hint) {
    printErr(`  ${colors.dim(`Hint: ${options.hint}`)}`);
  }
}

function hintFor(error: unknown): string | undefined {
  if (error instanceof UnsupportedProviderError) {
    return 'Choose a provider with "gitscribe config --provider <name>"';
  }
  if (error instanceof MissingCredentialError) {
    return 'Set API_KEY in the environment or run "gitscribe config --api-key <key>"';
  }
  if (error instanceof ConfigurationError) {
    if (error.field === 'AI_PROVIDER') {
      return 'Run "gitscribe config --provider <name>"';
    }
    return error.configFile ? `Check ${error.configFile}` : undefined;
  }
  if (error instanceof DiffUnavailableError) {
    return error.nothingStaged ? 'Stage changes with "git add" first' : undefined;
  }
  if (error instanceof ProviderUnavailableError) {
    return error.remediation;
  }
  if (error instanceof ModelNotFoundError) {
    return `Install it with "ollama pull ${error.model}"`;
  }
  if (error instanceof ProviderConnectionError) {
    return 'Check your network connection, or raise REQUEST_TIMEOUT_MS';
  }
  if (error instanceof ProviderResponseError && (error.status === 401 || error.status === 403)) {
    return 'Check that your API key is valid';
  }
  if (error instanceof MalformedGenerationError) {
    return 'Try again, or use a different model';
  }
  return undefined;
}

function detailFor(error: unknown): string | undefined {
  if (error instanceof GitCommandError) {
    return error.stderr;
  }
  if (error instanceof ProviderResponseError) {
    return error.body || undefined;
  }
  if (error instanceof MalformedGenerationError) {
    return error.rawText ? `Received: ${error.rawText}` : undefined;
  }
  if (error instanceof ModelNotFoundError && error.available.length > 0) {
    return `Installed models: ${error.available.join(', ')}`;
  }
  return undefined;
}

/**
 * Extract display info from an error object.
 */
export function errorToDisplay(error: unknown): ErrorDisplayOptions {
  // inquirer rejects with ExitPromptError on Ctrl+C
  if (error instanceof Error && error.name === 'ExitPromptError') {
    return { title: 'Cancelled' };
  }

  const title = error instanceof Error ? error.message : String(error);
  return { title, detail: detailFor(error), hint: hintFor(error) };
}
