/**
 * Logging for gitscribe
 *
 * Consola-based singleton logger with:
 * - StderrReporter: verbose/quiet aware stderr output
 * - FileReporter: optional append-only log file
 *
 * Configuration sources (in order of priority):
 * 1. CLI flags (--verbose, --quiet, --no-color, --log-file)
 * 2. Environment variables (GITSCRIBE_LOG_LEVEL, GITSCRIBE_LOG_FILE)
 * 3. Default (INFO)
 */

import fs from 'fs';
import path from 'path';
import { createConsola } from 'consola';
import type { ConsolaReporter, LogObject } from 'consola';
import { LogLevel, LOG_FILE_ENV, LOG_LEVEL_ENV, PACKAGE_NAME } from './constants.js';
import { setColorEnabled } from './colors.js';

export { LogLevel };

/** Whether a log-file failure has already been reported */
let logFileWarned = false;

/** Reporter holding an open log file, closed on reset */
let activeFileReporter: FileReporter | null = null;

// ---------------------------------------------------------------------------
// FileReporter
// ---------------------------------------------------------------------------

/**
 * Appends log entries to a file as `[timestamp] LEVEL [tag] message` lines.
 * Writes are synchronous so the last lines survive process.exit().
 */
class FileReporter implements ConsolaReporter {
  readonly filePath: string;
  private fd: number | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      this.fd = fs.openSync(filePath, 'a');
    } catch (err) {
      warnOnce(`Failed to open log file: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  log(logObj: LogObject): void {
    if (this.fd === null) return;

    const timestamp = logObj.date.toISOString();
    const tag = logObj.tag ? ` [${logObj.tag}]` : '';
    const line = `[${timestamp}] ${levelToName(logObj.level)}${tag} ${formatLogArgs(logObj.args)}\n`;

    try {
      fs.writeSync(this.fd, line);
    } catch (err) {
      warnOnce(`Log file write error: ${err instanceof Error ? err.message : String(err)}`);
      this.close();
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}

// ---------------------------------------------------------------------------
// StderrReporter
// ---------------------------------------------------------------------------

/**
 * Writes to stderr based on log level and verbose mode.
 * WARN and ERROR always print; INFO/DEBUG/TRACE only print when verbose=true.
 */
class StderrReporter implements ConsolaReporter {
  private verbose: boolean;
  private useColors: boolean;

  constructor(verbose: boolean, useColors: boolean) {
    this.verbose = verbose;
    this.useColors = useColors;
  }

  log(logObj: LogObject): void {
    if (logObj.level >= 2 && !this.verbose) {
      return;
    }

    const levelName = levelToName(logObj.level);
    const tag = logObj.tag ? ` [${logObj.tag}]` : '';
    const prefix = this.useColors ? colorizeLevel(levelName, logObj.level) : `[${levelName}]`;

    process.stderr.write(`${prefix}${tag} ${formatLogArgs(logObj.args)}\n`);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function warnOnce(message: string): void {
  if (logFileWarned) return;
  logFileWarned = true;
  process.stderr.write(`[${PACKAGE_NAME}] ${message}\n`);
}

function levelToName(level: number): string {
  if (level <= 0) {
    return level === 0 ? 'ERROR' : 'SILENT';
  }
  switch (level) {
    case 1:
      return 'WARN';
    case 2:
      return 'LOG';
    case 3:
      return 'INFO';
    case 4:
      return 'DEBUG';
    default:
      return 'TRACE';
  }
}

function colorizeLevel(name: string, level: number): string {
  const RED = '\x1b[31m';
  const YELLOW = '\x1b[33m';
  const CYAN = '\x1b[36m';
  const GRAY = '\x1b[90m';
  const RESET = '\x1b[0m';

  switch (true) {
    case level <= 0:
      return `${RED}[${name}]${RESET}`;
    case level === 1:
      return `${YELLOW}[${name}]${RESET}`;
    case level <= 3:
      return `${CYAN}[${name}]${RESET}`;
    default:
      return `${GRAY}[${name}]${RESET}`;
  }
}

function formatLogArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.message;
      return typeof a === 'object' && a !== null ? JSON.stringify(a) : String(a);
    })
    .join(' ');
}

// ---------------------------------------------------------------------------
// Logger singleton
// ---------------------------------------------------------------------------

/**
 * The singleton consola logger instance.
 * Starts with empty reporters; call initializeLogger() to configure.
 */
export const logger = createConsola({
  level: LogLevel.INFO,
  reporters: [],
});

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  logFile?: string;
}

/**
 * Configure the logger with CLI flags, env vars, and reporters.
 * Safe to call multiple times (replaces reporters each time).
 */
export function initializeLogger(options: LoggerOptions = {}): void {
  let level: number;
  const envLevel = process.env[LOG_LEVEL_ENV];

  if (options.quiet) {
    level = LogLevel.ERROR;
  } else if (options.verbose) {
    level = LogLevel.DEBUG;
  } else if (envLevel) {
    level = parseLogLevel(envLevel) ?? LogLevel.INFO;
  } else {
    level = LogLevel.INFO;
  }

  logger.level = level;

  const useColors = !options.noColor && process.env.NO_COLOR === undefined;
  if (options.noColor) {
    setColorEnabled(false);
  }

  const reporters: ConsolaReporter[] = [];

  if (activeFileReporter) {
    activeFileReporter.close();
    activeFileReporter = null;
  }

  const logFile = options.logFile ?? process.env[LOG_FILE_ENV];
  if (logFile) {
    activeFileReporter = new FileReporter(path.resolve(logFile));
    reporters.push(activeFileReporter);
  }

  // GITSCRIBE_LOG_LEVEL=debug shows debug lines without --verbose
  const verbose = options.verbose === true || (!options.quiet && level >= LogLevel.DEBUG);
  reporters.push(new StderrReporter(verbose, useColors));

  logger.setReporters(reporters);
}

/**
 * Parse a string log level name to its numeric consola equivalent.
 * Returns undefined for unrecognized values.
 */
export function parseLogLevel(value: string): number | undefined {
  const normalized = value.toLowerCase().trim();
  const mapping: Record<string, number> = {
    silent: LogLevel.SILENT,
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    warning: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
    verbose: LogLevel.DEBUG,
    trace: LogLevel.TRACE,
  };
  return mapping[normalized];
}

/**
 * Reset all module-level state for test isolation.
 * Prefixed with _ to signal internal-only use.
 */
export function _resetForTesting(): void {
  logFileWarned = false;
  if (activeFileReporter) {
    activeFileReporter.close();
  }
  activeFileReporter = null;
  logger.setReporters([]);
  logger.level = LogLevel.INFO;
}
