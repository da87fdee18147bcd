/**
 * Shared CLI input handling
 */

import { readFileSync } from 'fs';
import { isMessageFormat, MESSAGE_FORMATS, type MessageFormat } from '../src/utils/format.js';

export interface CommonOptions {
  seed: string;
  file?: string;
  output?: string;
  zeroPositions?: boolean;
  quiet?: boolean;
  json?: boolean;
}

export type Logger = (...args: unknown[]) => void;

export function createLogger(options: { quiet?: boolean; json?: boolean }): Logger {
  return options.quiet || options.json ? () => {} : console.error.bind(console);
}

/**
 * Input from the positional argument, -f file, or piped stdin
 */
export function readInput(text: string | undefined, file: string | undefined, log: Logger): string {
  if (file) {
    log(`Reading from ${file}...`);
    return readFileSync(file, 'utf-8');
  }
  if (text !== undefined) {
    return text;
  }
  if (!process.stdin.isTTY) {
    log('Reading from stdin...');
    return readFileSync(0, 'utf-8');
  }
  throw new Error('No input provided. Use text argument, -f flag, or pipe input.');
}

export function resolveFormat(value: string): MessageFormat {
  const format = value.toLowerCase();
  if (!isMessageFormat(format)) {
    throw new Error(`Invalid format "${value}". Use ${MESSAGE_FORMATS.map(f => `"${f}"`).join(' or ')}.`);
  }
  return format;
}

/**
 * Report a command failure and set a non-zero exit code
 */
export function reportError(error: unknown, json: boolean | undefined): void {
  const message = error instanceof Error ? error.message : String(error);
  if (json) {
    console.log(JSON.stringify({ success: false, error: message }, null, 2));
  } else {
    console.error('Error:', message);
  }
  process.exitCode = 1;
}
