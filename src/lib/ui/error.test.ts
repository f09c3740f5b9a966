import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { printError, errorToDisplay } from './error.js';
import { setColorEnabled } from '../colors.js';
import {
  ConfigurationError,
  DiffUnavailableError,
  MalformedGenerationError,
  MissingCredentialError,
  ModelNotFoundError,
  ProviderResponseError,
  ProviderUnavailableError,
  UnsupportedProviderError,
} from '../errors.js';

describe('ui/error', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setColorEnabled(false);
  });

  afterEach(() => {
    setColorEnabled(true);
    vi.restoreAllMocks();
  });

  describe('printError', () => {
    it('writes only the title when there is nothing else', () => {
      printError({ title: 'Something failed' });
      expect(errorSpy.mock.calls).toEqual([['[ERROR] Something failed']]);
    });

    it('writes title, detail and hint lines', () => {
      printError({ title: 'Not found', detail: 'stderr output here', hint: 'check the path' });
      expect(errorSpy.mock.calls).toEqual([
        ['[ERROR] Not found'],
        ['  stderr output here'],
        ['  Hint: check the path'],
      ]);
    });
  });

  describe('errorToDisplay', () => {
    it('uses the message of plain errors', () => {
      expect(errorToDisplay(new Error('boom'))).toEqual({
        title: 'boom',
        detail: undefined,
        hint: undefined,
      });
      expect(errorToDisplay('text')).toMatchObject({ title: 'text' });
    });

    it('shows a cancelled prompt as Cancelled', () => {
      const error = new Error('User force closed the prompt with SIGINT');
      error.name = 'ExitPromptError';
      expect(errorToDisplay(error)).toEqual({ title: 'Cancelled' });
    });

    it('hints how to pick a provider', () => {
      const display = errorToDisplay(
        new UnsupportedProviderError('openai', ['deepseek', 'claude', 'ollama'])
      );
      expect(display.hint).toBe('Choose a provider with "gitscribe config --provider <name>"');

      const missing = errorToDisplay(
        new ConfigurationError('No provider configured', { field: 'AI_PROVIDER' })
      );
      expect(missing.hint).toBe('Run "gitscribe config --provider <name>"');
    });

    it('hints how to set an API key', () => {
      expect(errorToDisplay(new MissingCredentialError('claude')).hint).toBe(
        'Set API_KEY in the environment or run "gitscribe config --api-key <key>"'
      );
    });

    it('points at the config file', () => {
      const error = new ConfigurationError('Invalid value', { configFile: '/home/u/.gitscribe' });
      expect(errorToDisplay(error).hint).toBe('Check /home/u/.gitscribe');
    });

    it('suggests staging when nothing is staged', () => {
      const display = errorToDisplay(
        new DiffUnavailableError('No staged changes found', {
          command: 'git diff --staged',
          nothingStaged: true,
        })
      );
      expect(display).toEqual({
        title: 'No staged changes found',
        detail: undefined,
        hint: 'Stage changes with "git add" first',
      });
    });

    it('gives no staging hint when git could not be started', () => {
      const display = errorToDisplay(
        new DiffUnavailableError('Could not read staged changes', {
          command: 'git diff --staged',
          stderr: 'spawn git ENOENT',
        })
      );
      expect(display).toEqual({
        title: 'Could not read staged changes',
        detail: 'spawn git ENOENT',
        hint: undefined,
      });
    });

    it('shows git stderr as detail', () => {
      const display = errorToDisplay(
        new DiffUnavailableError('Could not read staged changes', {
          command: 'git diff --staged',
          exitCode: 128,
          stderr: 'fatal: not a git repository',
        })
      );
      expect(display).toEqual({
        title: 'Could not read staged changes',
        detail: 'fatal: not a git repository',
        hint: undefined,
      });
    });

    it('uses the remediation of an unavailable daemon', () => {
      const error = new ProviderUnavailableError('Ollama is not reachable', {
        provider: 'ollama',
        host: 'http://localhost:11434',
        remediation: 'Start the daemon with "ollama serve", or set OLLAMA_HOST',
      });
      expect(errorToDisplay(error).hint).toBe(
        'Start the daemon with "ollama serve", or set OLLAMA_HOST'
      );
    });

    it('suggests pulling a missing model', () => {
      const error = new ModelNotFoundError('codellama:13b', {
        provider: 'ollama',
        available: ['llama3:latest', 'mistral:7b'],
      });
      expect(errorToDisplay(error)).toEqual({
        title: 'Model "codellama:13b" is not installed',
        detail: 'Installed models: llama3:latest, mistral:7b',
        hint: 'Install it with "ollama pull codellama:13b"',
      });
    });

    it('shows the response body and an auth hint', () => {
      const error = new ProviderResponseError('DeepSeek API returned status 401', {
        provider: 'deepseek',
        status: 401,
        body: '{"error":"invalid key"}',
      });
      expect(errorToDisplay(error)).toEqual({
        title: 'DeepSeek API returned status 401',
        detail: '{"error":"invalid key"}',
        hint: 'Check that your API key is valid',
      });
    });

    it('shows the raw text of a malformed generation', () => {
      const error = new MalformedGenerationError('Ollama response does not start with a commit type', {
        provider: 'ollama',
        rawText: 'add x',
      });
      expect(errorToDisplay(error)).toEqual({
        title: 'Ollama response does not start with a commit type',
        detail: 'Received: add x',
        hint: 'Try again, or use a different model',
      });
    });
  });
});
