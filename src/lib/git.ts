import { spawnSync } from 'child_process';
import { DiffUnavailableError, GitCommandError } from './errors.js';

/**
 * Commit options
 */
export interface CommitOptions {
  message: string;
  /** Passed to `git commit --date` verbatim */
  date?: string;
  cwd?: string;
}

function formatCommand(args: string[]): string {
  return `git ${args.join(' ')}`;
}

/**
 * Execute a git command and return its stdout.
 *
 * Arguments are passed without a shell, so messages and dates need no quoting.
 */
export function exec(args: string[], options: { cwd?: string } = {}): string {
  const result = spawnSync('git', args, {
    cwd: options.cwd,
    encoding: 'utf8',
    stdio: ['pipe', 'pipe', 'pipe'],
    maxBuffer: 1024 * 1024 * 50, // 50MB, staged diffs can be large
  });

  if (result.error) {
    throw new GitCommandError(`Failed to run ${formatCommand(args)}: ${result.error.message}`, {
      command: formatCommand(args),
    });
  }

  if (result.status !== 0) {
    const stderr = result.stderr.trim();
    throw new GitCommandError(`Git command failed: ${formatCommand(args)}`, {
      command: formatCommand(args),
      exitCode: result.status ?? undefined,
      stderr: stderr || undefined,
    });
  }

  return result.stdout;
}

/**
 * Get the staged changes as a unified diff
 */
export function getStagedDiff(cwd?: string): string {
  try {
    return exec(['diff', '--staged'], { cwd });
  } catch (error) {
    if (error instanceof GitCommandError) {
      throw new DiffUnavailableError('Could not read staged changes', {
        command: error.command,
        exitCode: error.exitCode,
        stderr: error.stderr,
      });
    }
    throw error;
  }
}

/**
 * Create a commit from the staged changes.
 *
 * git's own output (hooks, summary line) goes straight to the terminal.
 */
export function commit(options: CommitOptions): void {
  const args = ['commit'];
  if (options.date) {
    args.push('--date', options.date);
  }
  args.push('-m', options.message);

  const result = spawnSync('git', args, {
    cwd: options.cwd,
    stdio: 'inherit',
  });

  const command = 'git commit';

  if (result.error) {
    throw new GitCommandError(`Failed to run ${command}: ${result.error.message}`, { command });
  }

  if (result.status !== 0) {
    throw new GitCommandError(`git commit exited with code ${result.status ?? 'unknown'}`, {
      command,
      exitCode: result.status ?? undefined,
    });
  }
}
