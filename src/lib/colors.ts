/**
 * Terminal styling for gitscribe output
 *
 * Color is on when stdout is a TTY and NO_COLOR is unset; FORCE_COLOR turns
 * it on regardless. `--no-color` switches it off at runtime.
 */

const SGR = {
  reset: 0,
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  cyan: 36,
  gray: 90,
} as const;

export type Style = Exclude<keyof typeof SGR, 'reset'>;

function detectColor(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR !== undefined) {
    return false;
  }
  return env.FORCE_COLOR !== undefined || (process.stdout.isTTY ?? false);
}

let enabled = detectColor();

export function setColorEnabled(value: boolean): void {
  enabled = value;
}

/**
 * Wrap text in one SGR style, or return it unchanged when color is off
 */
export function paint(style: Style, text: string): string {
  return enabled ? `\x1b[${SGR[style]}m${text}\x1b[${SGR.reset}m` : text;
}

export function bold(text: string): string {
  return paint('bold', text);
}

export function dim(text: string): string {
  return paint('dim', text);
}

export function cyan(text: string): string {
  return paint('cyan', text);
}

export type StatusKind = 'success' | 'warning' | 'error' | 'info';

interface StatusMarker {
  icon: string;
  /** Printed instead of the icon when color is off */
  label: string;
  style: Style;
  /** Color the text as well as the icon */
  tintText: boolean;
}

const MARKERS: Record<StatusKind, StatusMarker> = {
  success: { icon: '✓', label: '[OK]', style: 'green', tintText: false },
  warning: { icon: '⚠', label: '[WARN]', style: 'yellow', tintText: true },
  error: { icon: '✗', label: '[ERROR]', style: 'red', tintText: true },
  info: { icon: 'ℹ', label: '[INFO]', style: 'blue', tintText: false },
};

/**
 * Prefix a status line with its icon, e.g. `✓ Commit created`
 */
export function status(kind: StatusKind, text: string): string {
  const marker = MARKERS[kind];
  if (!enabled) {
    return `${marker.label} ${text}`;
  }
  const body = marker.tintText ? paint(marker.style, text) : text;
  return `${paint(marker.style, marker.icon)} ${body}`;
}
