/**
 * Commit message prompt
 *
 * One fixed instruction template shared by every provider. Only the diff
 * varies between calls, and it is inserted verbatim.
 */

import type { CommitType } from '../constants.js';

/**
 * One-line meaning of each allowed commit type, in prompt order
 */
export const COMMIT_TYPE_DESCRIPTIONS: Record<CommitType, string> = {
  feat: 'A new feature',
  fix: 'A bug fix',
  docs: 'Documentation changes',
  style: 'Formatting changes',
  refactor: 'Code refactoring',
  perf: 'Performance improvements',
  test: 'Adding or adjusting tests',
  chore: 'Maintenance tasks',
  build: 'Build system changes',
  ci: 'CI/CD changes',
  revert: 'Reverting a commit',
};

const DIFF_PLACEHOLDER = '{{diff}}';

const typeList = Object.entries(COMMIT_TYPE_DESCRIPTIONS)
  .map(([type, description]) => `- ${type}: ${description}`)
  .join('\n');

/**
 * The prompt template, with a placeholder where the diff goes
 */
export const COMMIT_PROMPT_TEMPLATE = `You are a commit assistant and an expert in Conventional Commits.

Analyze this diff and write a commit message that follows the Conventional Commits standard:

${DIFF_PLACEHOLDER}

Required format:
<type>[optional scope]: <concise description>

Allowed types:
${typeList}

Reply ONLY with the commit message, without any extra commentary.`;

/**
 * Build the generation prompt for a staged diff
 */
export function buildCommitPrompt(diff: string): string {
  // Function replacer so `$&`-style sequences in the diff are not expanded
  return COMMIT_PROMPT_TEMPLATE.replace(DIFF_PLACEHOLDER, () => diff);
}
