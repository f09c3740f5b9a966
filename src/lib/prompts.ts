/**
 * Interactive prompt helpers
 */

import inquirer from 'inquirer';
import { cyan } from './colors.js';
import { isQuietMode } from './ui/output.js';

/**
 * Ask a yes/no question
 */
export async function promptConfirm(message: string, defaultValue: boolean = false): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: defaultValue,
    },
  ]);
  return confirmed;
}

/**
 * Run an async operation with a spinner on stderr.
 * Without a TTY the message is printed once instead; in quiet mode nothing is.
 */
export async function withSpinner<T>(message: string, operation: () => Promise<T>): Promise<T> {
  if (isQuietMode()) {
    return operation();
  }

  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIndex = 0;
  let interval: NodeJS.Timeout | null = null;

  const showSpinner = process.stderr.isTTY ?? false;

  if (showSpinner) {
    interval = setInterval(() => {
      process.stderr.write(`\r${cyan(frames[frameIndex])} ${message}`);
      frameIndex = (frameIndex + 1) % frames.length;
    }, 80);
  } else {
    process.stderr.write(`${message}\n`);
  }

  const clear = (): void => {
    if (interval) {
      clearInterval(interval);
      process.stderr.write('\r' + ' '.repeat(message.length + 3) + '\r');
    }
  };

  try {
    const result = await operation();
    clear();
    return result;
  } catch (error) {
    clear();
    throw error;
  }
}
