/**
 * Cipher operations
 *
 * Flow: text -> ITA2 symbols -> XOR with keystream(seed) -> ciphertext symbols
 * Every call builds a fresh wheel bank from the seed.
 */
import { LIMITS } from '../utils/constants.js';
import { CipherError } from '../lib/errors.js';
import { encodeText, decodeSymbols } from '../codec/ita2.js';
import { KeystreamGenerator } from '../keystream/generator.js';
import type { GenerateOptions, Seed } from '../seed/expand.js';
import { transform, type Message } from './transform.js';

export interface CipherOptions extends GenerateOptions {
  // Passed to the ITA2 encoder (encrypt only)
  substitute?: string;
}

/**
 * Check if a message is within size limits
 */
export function checkMessageSize(message: Message): {
  valid: boolean;
  warning: boolean;
  message?: string;
} {
  if (message.length > LIMITS.MAX_MESSAGE_SYMBOLS) {
    return {
      valid: false,
      warning: false,
      message: `Message exceeds maximum size (${LIMITS.MAX_MESSAGE_SYMBOLS} symbols)`,
    };
  }

  if (message.length > LIMITS.SOFT_LIMIT_SYMBOLS) {
    return {
      valid: true,
      warning: true,
      message: 'Large message - keystream generation may take a while',
    };
  }

  return { valid: true, warning: false };
}

function assertMessageSize(message: Message): void {
  const sizeCheck = checkMessageSize(message);
  if (!sizeCheck.valid) {
    throw new CipherError(sizeCheck.message ?? 'Message too large');
  }
}

export function encryptSymbols(message: Message, seed: Seed, options?: GenerateOptions): number[] {
  assertMessageSize(message);
  return transform(message, KeystreamGenerator.fromSeed(seed, options));
}

/**
 * Same operation as encryptSymbols; provided for API clarity
 */
export function decryptSymbols(ciphertext: Message, seed: Seed, options?: GenerateOptions): number[] {
  return encryptSymbols(ciphertext, seed, options);
}

/**
 * Encode text as ITA2 and encipher it
 */
export function encrypt(text: string, seed: Seed, options: CipherOptions = {}): number[] {
  const { substitute, ...generateOptions } = options;
  const plain = encodeText(text, { substitute });
  return encryptSymbols(plain, seed, generateOptions);
}

/**
 * Decipher ciphertext symbols and decode the ITA2 result
 */
export function decrypt(ciphertext: Message, seed: Seed, options: GenerateOptions = {}): string {
  return decodeSymbols(decryptSymbols(ciphertext, seed, options));
}
