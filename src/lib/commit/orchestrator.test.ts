import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import { commitWithAI, createDefaultDeps, previewDiff } from './orchestrator.js';
import type { CommitDeps } from './orchestrator.js';
import * as git from '../git.js';
import { ProviderRegistry, PROVIDER_FACTORIES } from '../ai/provider-registry.js';
import { DeepSeekProvider } from '../ai/deepseek-provider.js';
import type { CommitMessageProvider, ProviderName } from '../ai/types.js';
import { DiffUnavailableError, ProviderResponseError } from '../errors.js';

vi.mock('../git.js', () => ({
  getStagedDiff: vi.fn(),
  commit: vi.fn(),
}));

const DIFF = 'diff --git a/f b/f\n+hello\n';

function fakeProvider(name: ProviderName, message = 'feat: add hello line') {
  const generate = vi.fn<CommitMessageProvider['generate']>().mockResolvedValue(message);
  const provider: CommitMessageProvider = { name, generate };
  return { provider, generate };
}

function createDeps(provider: CommitMessageProvider, overrides: Partial<CommitDeps> = {}) {
  const base = {
    getStagedDiff: vi.fn(() => DIFF),
    resolveProvider: vi.fn(() => provider),
    confirm: vi.fn(async () => true),
    commit: vi.fn(),
  };
  return Object.assign(base, overrides);
}

describe('commitWithAI', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('commits with exactly the generated message', async () => {
    const requests: unknown[] = [];
    const httpClient = axios.create({
      adapter: async (config) => {
        requests.push(JSON.parse(String(config.data)));
        return {
          data: { choices: [{ message: { content: 'feat: add hello line' } }] },
          status: 200,
          statusText: 'OK',
          headers: {},
          config,
        };
      },
    });
    const registry = new ProviderRegistry(
      { apiKey: 'test-secret' },
      {
        ...PROVIDER_FACTORIES,
        deepseek: (settings) => new DeepSeekProvider({ ...settings, httpClient }),
      }
    );
    const commit = vi.fn();

    const outcome = await commitWithAI(
      { provider: 'deepseek', yes: true },
      {
        getStagedDiff: () => DIFF,
        resolveProvider: (name) => registry.resolve(name),
        confirm: vi.fn(),
        commit,
      }
    );

    expect(requests).toHaveLength(1);
    expect(commit).toHaveBeenCalledTimes(1);
    expect(commit).toHaveBeenCalledWith({ message: 'feat: add hello line', date: undefined });
    expect(outcome).toEqual({ status: 'committed', message: 'feat: add hello line', date: undefined });
  });

  it('passes the requested model to remote providers', async () => {
    const { provider, generate } = fakeProvider('claude');
    const deps = createDeps(provider);

    await commitWithAI({ provider: 'claude', model: 'claude-3-5-sonnet-latest', yes: true }, deps);

    expect(deps.resolveProvider).toHaveBeenCalledWith('claude');
    expect(generate).toHaveBeenCalledWith(DIFF, { model: 'claude-3-5-sonnet-latest' });
  });

  it('ignores a caller-supplied model for ollama', async () => {
    const { provider, generate } = fakeProvider('ollama');
    const deps = createDeps(provider);

    await commitWithAI({ provider: 'ollama', model: 'gpt-4o', yes: true }, deps);

    expect(generate).toHaveBeenCalledWith(DIFF, { model: undefined });
  });

  it('asks for confirmation unless yes is set', async () => {
    const { provider } = fakeProvider('deepseek');
    const deps = createDeps(provider);

    await commitWithAI({ provider: 'deepseek' }, deps);
    expect(deps.confirm).toHaveBeenCalledWith('feat: add hello line');

    deps.confirm.mockClear();
    await commitWithAI({ provider: 'deepseek', yes: true }, deps);
    expect(deps.confirm).not.toHaveBeenCalled();
  });

  it('does not commit when confirmation is declined', async () => {
    const { provider } = fakeProvider('deepseek');
    const deps = createDeps(provider, { confirm: vi.fn(async () => false) });

    const outcome = await commitWithAI({ provider: 'deepseek' }, deps);

    expect(outcome).toEqual({ status: 'cancelled', message: 'feat: add hello line' });
    expect(deps.commit).not.toHaveBeenCalled();
  });

  it('passes the commit date through', async () => {
    const { provider } = fakeProvider('deepseek');
    const deps = createDeps(provider);

    const outcome = await commitWithAI(
      { provider: 'deepseek', yes: true, date: '2024-01-01 12:00' },
      deps
    );

    expect(deps.commit).toHaveBeenCalledWith({
      message: 'feat: add hello line',
      date: '2024-01-01 12:00',
    });
    expect(outcome).toEqual({
      status: 'committed',
      message: 'feat: add hello line',
      date: '2024-01-01 12:00',
    });
  });

  it('fails on an empty diff before resolving a provider', async () => {
    const { provider } = fakeProvider('deepseek');
    const deps = createDeps(provider, { getStagedDiff: vi.fn(() => '  \n') });

    const error = await commitWithAI({ provider: 'deepseek', yes: true }, deps).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(DiffUnavailableError);
    expect(error).toMatchObject({
      message: 'No staged changes found',
      command: 'git diff --staged',
      nothingStaged: true,
    });
    expect(deps.resolveProvider).not.toHaveBeenCalled();
  });

  it('propagates provider errors without committing', async () => {
    const provider: CommitMessageProvider = {
      name: 'deepseek',
      generate: vi.fn().mockRejectedValue(
        new ProviderResponseError('DeepSeek API returned status 500', { provider: 'deepseek' })
      ),
    };
    const deps = createDeps(provider);

    await expect(commitWithAI({ provider: 'deepseek', yes: true }, deps)).rejects.toThrow(
      'DeepSeek API returned status 500'
    );
    expect(deps.commit).not.toHaveBeenCalled();
  });

  it('reports a non-conventional message but still commits it', async () => {
    const { provider } = fakeProvider('deepseek', 'Added a hello line');
    const onMessage = vi.fn();
    const deps = createDeps(provider, { onMessage });

    await commitWithAI({ provider: 'deepseek', yes: true }, deps);

    expect(onMessage).toHaveBeenCalledWith('Added a hello line', false);
    expect(deps.commit).toHaveBeenCalledWith({ message: 'Added a hello line', date: undefined });
  });

  it('shows a diff preview only in verbose mode', async () => {
    const { provider } = fakeProvider('deepseek');
    const onDiffPreview = vi.fn();
    const deps = createDeps(provider, { onDiffPreview });

    await commitWithAI({ provider: 'deepseek', yes: true }, deps);
    expect(onDiffPreview).not.toHaveBeenCalled();

    await commitWithAI({ provider: 'deepseek', yes: true, verbose: true }, deps);
    expect(onDiffPreview).toHaveBeenCalledWith(`${DIFF}...`);
  });

  it('wraps generation in withProgress', async () => {
    const { provider } = fakeProvider('claude');
    const labels: string[] = [];
    const withProgress = <T>(label: string, operation: () => Promise<T>): Promise<T> => {
      labels.push(label);
      return operation();
    };
    const deps = createDeps(provider, { withProgress });

    await expect(commitWithAI({ provider: 'claude', yes: true }, deps)).resolves.toMatchObject({
      status: 'committed',
    });
    expect(labels).toEqual(['Generating commit message with claude...']);
  });
});

describe('previewDiff', () => {
  it('keeps the first 500 characters and appends an ellipsis', () => {
    const diff = 'a'.repeat(499) + 'bc';
    expect(previewDiff(diff)).toBe(`${'a'.repeat(499)}b...`);
  });

  it('appends the ellipsis to short diffs too', () => {
    expect(previewDiff('+x\n')).toBe('+x\n...');
  });
});

describe('createDefaultDeps', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  const config = {
    apiKey: 'test-secret',
    ollamaHost: 'http://localhost:11434',
    ollamaModel: 'codellama:13b',
    timeoutMs: 60000,
  };

  it('reads the diff and commits in the given directory', () => {
    vi.mocked(git.getStagedDiff).mockReturnValue(DIFF);
    const deps = createDefaultDeps(config, '/repo');

    expect(deps.getStagedDiff()).toBe(DIFF);
    expect(git.getStagedDiff).toHaveBeenCalledWith('/repo');

    deps.commit({ message: 'feat: x', date: '2024-01-01' });
    expect(git.commit).toHaveBeenCalledWith({ message: 'feat: x', date: '2024-01-01', cwd: '/repo' });
  });

  it('resolves providers from the config', () => {
    const deps = createDefaultDeps(config);
    expect(deps.resolveProvider('deepseek')).toBeInstanceOf(DeepSeekProvider);
  });
});
