/**
 * Text forms of a symbol message
 *
 *   binary   "0b" + 5 bits per symbol, most significant bit first
 *   symbols  comma-separated decimal values
 */
import { SYMBOL } from './constants.js';
import { EncodingError } from '../lib/errors.js';
import { validateMessage, type Message } from '../cipher/transform.js';

export type MessageFormat = 'binary' | 'symbols';

export const MESSAGE_FORMATS: readonly MessageFormat[] = ['binary', 'symbols'];

export function isMessageFormat(value: string): value is MessageFormat {
  return value === 'binary' || value === 'symbols';
}

export function symbolsToBinary(message: Message): string {
  validateMessage(message);
  return '0b' + message.map(s => s.toString(2).padStart(SYMBOL.BITS, '0')).join('');
}

export function binaryToSymbols(text: string): number[] {
  const bits = text.replace(/\s+/g, '').replace(/^0b/i, '');

  if (!/^[01]*$/.test(bits)) {
    throw new EncodingError('Binary message may only contain 0 and 1 after the 0b prefix');
  }
  if (bits.length % SYMBOL.BITS !== 0) {
    throw new EncodingError(`Binary message length ${bits.length} is not a multiple of ${SYMBOL.BITS}`);
  }

  const symbols: number[] = [];
  for (let i = 0; i < bits.length; i += SYMBOL.BITS) {
    symbols.push(parseInt(bits.slice(i, i + SYMBOL.BITS), 2));
  }
  return symbols;
}

export function formatSymbolList(message: Message): string {
  validateMessage(message);
  return message.join(',');
}

export function parseSymbolList(text: string): number[] {
  const trimmed = text.trim();
  if (trimmed === '') return [];

  const symbols = trimmed.split(/[\s,]+/).filter(part => part !== '').map(part => {
    if (!/^\d+$/.test(part)) {
      throw new EncodingError(`Invalid symbol "${part}"`);
    }
    return Number(part);
  });
  validateMessage(symbols);
  return symbols;
}

export function formatMessage(message: Message, format: MessageFormat): string {
  return format === 'binary' ? symbolsToBinary(message) : formatSymbolList(message);
}

export function parseMessage(text: string, format: MessageFormat): number[] {
  return format === 'binary' ? binaryToSymbols(text) : parseSymbolList(text);
}
