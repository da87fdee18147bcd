/**
 * Tunny CLI - command definitions
 */

import { Command } from 'commander';
import { VERSION } from '../src/utils/version.js';
import { encryptCommand } from './encrypt.js';
import { decryptCommand } from './decrypt.js';
import { wheelsCommand } from './wheels.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tunny')
    .description('Simulate the Lorenz SZ40/42 ("Tunny") teleprinter cipher.\n\nText is encoded in ITA2 and combined with a 12-wheel keystream whose psi wheels move irregularly under the motor wheels. The same seed deciphers what it enciphered.')
    .version(VERSION)
    .addHelpText('after', `
Examples:
  $ tunny encrypt "ATTACK AT DAWN" -s 42
  $ tunny encrypt -f message.txt -s 0x5eed -o cipher.txt
  $ tunny decrypt 0b101100011011100 -s 42
  $ tunny wheels -s 42`);

  program
    .command('encrypt')
    .description('Encrypt text with the keystream for a seed')
    .argument('[text]', 'Text to encrypt (or use -f for file input, or pipe from stdin)')
    .requiredOption('-s, --seed <seed>', 'Seed: decimal integer, or 0x-prefixed hex bytes')
    .option('-f, --file <path>', 'Read input text from a file')
    .option('-o, --output <path>', 'Write ciphertext to a file instead of stdout')
    .option('--format <format>', 'Ciphertext format: "binary" or "symbols"', 'binary')
    .option('--lenient', 'Replace characters ITA2 cannot express with "?"')
    .option('--zero-positions', 'Start every wheel at position 0')
    .option('-q, --quiet', 'Suppress progress output (only show result)')
    .option('--json', 'Output result as JSON')
    .addHelpText('after', `
Alphabet:
  Input is upper-cased and encoded in ITA2 (letters, figures, space, CR, LF).
  Other characters are an error unless --lenient is given.

Examples:
  $ tunny encrypt "HELLO" -s 42
  $ tunny encrypt "HELLO" -s 42 --format symbols
  $ cat orders.txt | tunny encrypt -s 0xdeadbeef --lenient`)
    .action(encryptCommand);

  program
    .command('decrypt')
    .description('Decrypt ciphertext produced with the same seed')
    .argument('[ciphertext]', 'Ciphertext (or use -f for file input, or pipe from stdin)')
    .requiredOption('-s, --seed <seed>', 'Seed used for encryption')
    .option('-f, --file <path>', 'Read ciphertext from a file')
    .option('-o, --output <path>', 'Write decrypted text to a file instead of stdout')
    .option('--format <format>', 'Ciphertext format: "binary" or "symbols"', 'binary')
    .option('--zero-positions', 'Start every wheel at position 0')
    .option('-q, --quiet', 'Suppress progress output (only show result)')
    .option('--json', 'Output result as JSON')
    .action(decryptCommand);

  program
    .command('wheels')
    .description('Show the wheel patterns and start positions for a seed')
    .requiredOption('-s, --seed <seed>', 'Seed: decimal integer, or 0x-prefixed hex bytes')
    .option('--zero-positions', 'Start every wheel at position 0')
    .option('--json', 'Output wheel settings as JSON')
    .action(wheelsCommand);

  return program;
}
