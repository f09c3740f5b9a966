/**
 * Shared UI primitives for CLI output.
 */

// Output gating
export { setQuietMode, isQuietMode, print, printAlways, printErr } from './output.js';

// Status output
export { printStatus, printHeader, printDetail, printDim, printCommitMessage } from './status.js';

// Error output
export { printError, errorToDisplay } from './error.js';
export type { ErrorDisplayOptions } from './error.js';
