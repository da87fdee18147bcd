/**
 * Symbol-stream combiner
 *
 * result[i] = message[i] XOR keystream[i]. XOR is its own inverse, so the
 * same function enciphers and deciphers.
 */
import { SYMBOL } from '../utils/constants.js';
import { SymbolOutOfRange } from '../lib/errors.js';
import type { SymbolSource } from '../keystream/generator.js';

/** Ordered 5-bit symbols, each an integer 0..31 */
export type Message = readonly number[];

export function isSymbol(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= SYMBOL.MASK;
}

/**
 * Throws SymbolOutOfRange for the first value that is not a symbol
 */
export function validateMessage(message: Message): void {
  for (let i = 0; i < message.length; i++) {
    if (!isSymbol(message[i])) {
      throw new SymbolOutOfRange(i, message[i]);
    }
  }
}

/**
 * Combine a message with the keystream. The whole message is validated
 * before any keystream is drawn.
 */
export function transform(message: Message, generator: SymbolSource): number[] {
  validateMessage(message);

  const result = new Array<number>(message.length);
  for (let i = 0; i < message.length; i++) {
    result[i] = message[i] ^ generator.next();
  }
  return result;
}
