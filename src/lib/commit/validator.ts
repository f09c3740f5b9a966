/**
 * Conventional Commits message validation
 *
 * Header grammar:
 *   <type>[(<scope>)][!]: <description>
 *
 * followed by an optional body/footer section. Only the header decides
 * validity; the body is inspected for a BREAKING CHANGE footer but any body
 * is accepted, with or without a blank line after the header.
 */

import { COMMIT_TYPES, type CommitType } from '../constants.js';

const TYPE_ALTERNATION = COMMIT_TYPES.join('|');

const HEADER_PATTERN = new RegExp(
  `^(?<type>${TYPE_ALTERNATION})(?:\\((?<scope>[^)]+)\\))?(?<breaking>!)?: (?<description>[^\\n]+)$`,
  'i'
);

const BREAKING_FOOTER_PATTERN = /BREAKING[ -]CHANGE: /i;

const PREFIX_PATTERN = new RegExp(`^(?:${TYPE_ALTERNATION})(?:\\([^)]+\\))?!?:`, 'i');

/**
 * A parsed Conventional Commit message
 */
export interface ConventionalCommit {
  /** Lower-cased commit type */
  type: CommitType;
  scope?: string;
  /** `!` in the header or a BREAKING CHANGE footer */
  breaking: boolean;
  description: string;
  /** Everything after the header, trimmed; undefined when empty */
  body?: string;
}

function splitMessage(message: string): { header: string; rest: string } {
  const newline = message.indexOf('\n');
  if (newline === -1) {
    return { header: message.trim(), rest: '' };
  }
  return {
    header: message.slice(0, newline).trim(),
    rest: message.slice(newline + 1).trim(),
  };
}

/**
 * Parse a commit message, or return null when its header is not a
 * Conventional Commits header
 */
export function parseConventionalCommit(message: string): ConventionalCommit | null {
  const { header, rest } = splitMessage(message);
  const groups = HEADER_PATTERN.exec(header)?.groups;
  if (!groups) {
    return null;
  }

  const lowered = groups.type.toLowerCase();
  const type = COMMIT_TYPES.find((candidate) => candidate === lowered);
  if (!type) {
    return null;
  }

  return {
    type,
    scope: groups.scope || undefined,
    breaking: Boolean(groups.breaking) || BREAKING_FOOTER_PATTERN.test(rest),
    description: groups.description,
    body: rest || undefined,
  };
}

/**
 * Check whether a message follows the Conventional Commits header grammar
 */
export function isValidConventionalCommit(message: string): boolean {
  return parseConventionalCommit(message) !== null;
}

/**
 * Check whether text starts with a commit type followed by `:`
 * (an optional scope and `!` may sit in between)
 */
export function hasConventionalPrefix(text: string): boolean {
  return PREFIX_PATTERN.test(text);
}
