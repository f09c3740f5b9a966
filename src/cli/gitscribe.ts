#!/usr/bin/env node
/**
 * gitscribe - Conventional Commit messages from staged diffs
 *
 * Commands:
 *   gitscribe [commit]   Generate a message for the staged changes and commit
 *   gitscribe config     Show or update ~/.gitscribe
 */

import fs from 'fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { commitCommand } from './gitscribe/commit.js';
import { configCommand } from './gitscribe/config.js';
import { initializeLogger } from '../lib/logger.js';
import { setQuietMode } from '../lib/ui/index.js';

function readVersion(): string {
  const pkgUrl = new URL('../../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgUrl, 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

yargs(hideBin(process.argv))
  .scriptName('gitscribe')
  .usage('$0 [command] [options]')
  .option('verbose', {
    alias: 'v',
    type: 'boolean',
    description: 'Show debug output and a preview of the staged diff',
    global: true,
  })
  .option('quiet', {
    alias: 'q',
    type: 'boolean',
    description: 'Only print errors and the generated message',
    global: true,
  })
  .option('color', {
    type: 'boolean',
    description: 'Colorize output (--no-color to disable)',
    default: true,
    global: true,
  })
  .option('log-file', {
    type: 'string',
    description: 'Append logs to a file',
    global: true,
  })
  .middleware((argv) => {
    initializeLogger({
      verbose: argv.verbose,
      quiet: argv.quiet,
      noColor: argv.color === false,
      logFile: argv['log-file'],
    });
    setQuietMode(argv.quiet === true);
  })
  .command(commitCommand)
  .command(configCommand)
  .alias('h', 'help')
  .help()
  .version(readVersion())
  .wrap(Math.min(100, process.stdout.columns ?? 100))
  .strict()
  .fail((msg, err) => {
    if (err) {
      console.error(err.message);
    } else {
      console.error(msg);
    }
    process.exit(1);
  })
  .parseAsync()
  .catch((err) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
