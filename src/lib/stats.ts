/**
 * Ciphertext statistics
 */
import { SYMBOL } from '../utils/constants.js';
import { CipherError } from './errors.js';
import type { Message } from '../cipher/transform.js';

function popcount5(value: number): number {
  let count = 0;
  for (let i = 0; i < SYMBOL.BITS; i++) {
    count += (value >> i) & 1;
  }
  return count;
}

/**
 * Fraction of bits that differ between two equal-length messages
 * (0 for empty messages)
 */
export function bitChangeRatio(a: Message, b: Message): number {
  if (a.length !== b.length) {
    throw new CipherError(`Message lengths differ: ${a.length} vs ${b.length}`);
  }
  if (a.length === 0) return 0;

  let changed = 0;
  for (let i = 0; i < a.length; i++) {
    changed += popcount5(a[i] ^ b[i]);
  }
  return changed / (a.length * SYMBOL.BITS);
}

