/**
 * Status output functions for consistent CLI display.
 */

import * as colors from '../colors.js';
import { print, printAlways } from './output.js';

/**
 * Print a status message with the appropriate icon and color.
 *
 * Example: printStatus('success', 'Commit created')
 */
export function printStatus(kind: colors.StatusKind, message: string): void {
  print(colors.status(kind, message));
}

/**
 * Print a section header: blank line, bold title, blank line.
 */
export function printHeader(title: string): void {
  print('');
  print(colors.bold(title));
  print('');
}

/**
 * Print a label: value detail line with optional indentation.
 */
export function printDetail(label: string, value: string, indent: number = 2): void {
  const pad = ' '.repeat(indent);
  print(`${pad}${label}: ${value}`);
}

/**
 * Print dimmed text with optional indentation.
 */
export function printDim(message: string, indent: number = 0): void {
  const pad = ' '.repeat(indent);
  print(`${pad}${colors.dim(message)}`);
}

/**
 * Print the generated commit message, indented under a header.
 * Shown in quiet mode too, since the user confirms against it.
 */
export function printCommitMessage(message: string): void {
  printAlways('');
  printAlways(colors.bold('Generated commit message:'));
  for (const line of message.split('\n')) {
    printAlways(`  ${colors.cyan(line)}`);
  }
  printAlways('');
}
