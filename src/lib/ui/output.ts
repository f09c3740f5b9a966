/**
 * Output gate for `--quiet`.
 *
 * Status output goes through print(); output the user must see to answer a
 * prompt goes through printAlways(). Errors always reach stderr.
 */

let quietMode = false;

export function setQuietMode(enabled: boolean): void {
  quietMode = enabled;
}

export function isQuietMode(): boolean {
  return quietMode;
}

/**
 * Write a status line to stdout, unless quiet.
 */
export function print(...args: unknown[]): void {
  if (!quietMode) {
    console.log(...args);
  }
}

/**
 * Write to stdout even when quiet.
 */
export function printAlways(...args: unknown[]): void {
  console.log(...args);
}

/**
 * Write to stderr.
 */
export function printErr(...args: unknown[]): void {
  console.error(...args);
}
