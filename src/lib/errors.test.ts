import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DiffUnavailableError,
  GitCommandError,
  GitscribeError,
  MalformedGenerationError,
  MissingCredentialError,
  ModelNotFoundError,
  ProviderConnectionError,
  ProviderError,
  ProviderResponseError,
  ProviderUnavailableError,
  UnsupportedProviderError,
  isGitCommandError,
  isGitscribeError,
  isProviderError,
} from './errors.js';

describe('errors', () => {
  describe('GitscribeError', () => {
    it('is an Error with its own name', () => {
      const error = new GitscribeError('boom');
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('GitscribeError');
      expect(error.message).toBe('boom');
    });
  });

  describe('configuration errors', () => {
    it('UnsupportedProviderError lists the valid options', () => {
      const error = new UnsupportedProviderError('openai', ['deepseek', 'claude', 'ollama']);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.name).toBe('UnsupportedProviderError');
      expect(error.message).toBe(
        'Unsupported provider: openai. Valid options: deepseek, claude, ollama'
      );
      expect(error.field).toBe('AI_PROVIDER');
      expect(error.provider).toBe('openai');
    });

    it('MissingCredentialError names the provider', () => {
      const error = new MissingCredentialError('deepseek');

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.message).toBe('API key not found for deepseek');
      expect(error.field).toBe('API_KEY');
    });
  });

  describe('git errors', () => {
    it('DiffUnavailableError is a GitCommandError', () => {
      const error = new DiffUnavailableError('No staged changes found', {
        command: 'git diff --staged',
      });

      expect(error).toBeInstanceOf(GitCommandError);
      expect(error.name).toBe('DiffUnavailableError');
      expect(error.command).toBe('git diff --staged');
      expect(error.exitCode).toBeUndefined();
      expect(error.nothingStaged).toBe(false);
    });
  });

  describe('provider errors', () => {
    it('all extend ProviderError and carry the provider name', () => {
      const errors: ProviderError[] = [
        new ProviderConnectionError('down', { provider: 'deepseek' }),
        new ProviderResponseError('bad', { provider: 'claude', status: 500 }),
        new ProviderUnavailableError('off', {
          provider: 'ollama',
          host: 'http://localhost:11434',
          remediation: 'start it',
        }),
        new ModelNotFoundError('codellama:13b', { provider: 'ollama' }),
        new MalformedGenerationError('odd', { provider: 'ollama', rawText: 'add x' }),
      ];

      for (const error of errors) {
        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toBeInstanceOf(GitscribeError);
      }
      expect(errors.map((e) => e.provider)).toEqual([
        'deepseek',
        'claude',
        'ollama',
        'ollama',
        'ollama',
      ]);
    });

    it('ProviderConnectionError keeps the cause', () => {
      const cause = new Error('ECONNRESET');
      const error = new ProviderConnectionError('down', { provider: 'deepseek', cause });
      expect(error.cause).toBe(cause);
    });

    it('ModelNotFoundError names the model', () => {
      const error = new ModelNotFoundError('codellama:13b', {
        provider: 'ollama',
        available: ['llama3:latest'],
      });

      expect(error.message).toBe('Model "codellama:13b" is not installed');
      expect(error.available).toEqual(['llama3:latest']);
      expect(new ModelNotFoundError('x', { provider: 'ollama' }).available).toEqual([]);
    });
  });

  describe('type guards', () => {
    it('isGitscribeError', () => {
      expect(isGitscribeError(new ConfigurationError('x'))).toBe(true);
      expect(isGitscribeError(new Error('x'))).toBe(false);
      expect(isGitscribeError('x')).toBe(false);
    });

    it('isGitCommandError', () => {
      expect(isGitCommandError(new DiffUnavailableError('x', { command: 'git diff' }))).toBe(true);
      expect(isGitCommandError(new ConfigurationError('x'))).toBe(false);
    });

    it('isProviderError', () => {
      expect(isProviderError(new ModelNotFoundError('x', { provider: 'ollama' }))).toBe(true);
      expect(isProviderError(new MissingCredentialError('claude'))).toBe(false);
    });
  });
});
