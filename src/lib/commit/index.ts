export {
  parseConventionalCommit,
  isValidConventionalCommit,
  hasConventionalPrefix,
} from './validator.js';
export type { ConventionalCommit } from './validator.js';
export { commitWithAI, createDefaultDeps, previewDiff } from './orchestrator.js';
export type { CommitDeps, CommitOutcome, CommitRequest } from './orchestrator.js';
