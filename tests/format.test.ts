import { describe, it, expect } from 'vitest';
import {
  symbolsToBinary,
  binaryToSymbols,
  formatSymbolList,
  parseSymbolList,
  formatMessage,
  parseMessage,
  isMessageFormat,
} from '../src/utils/format.js';
import { EncodingError, SymbolOutOfRange } from '../src/lib/errors.js';

describe('Message formats', () => {
  describe('binary', () => {
    it('should write 5 bits per symbol, MSB first', () => {
      expect(symbolsToBinary([20, 1, 31])).toBe('0b101000000111111');
    });

    it('should write an empty message as the bare prefix', () => {
      expect(symbolsToBinary([])).toBe('0b');
    });

    it('should parse with or without prefix and whitespace', () => {
      expect(binaryToSymbols('0b101000000111111')).toEqual([20, 1, 31]);
      expect(binaryToSymbols('10100 00001\n11111')).toEqual([20, 1, 31]);
      expect(binaryToSymbols('0b')).toEqual([]);
    });

    it('should reject partial symbols', () => {
      expect(() => binaryToSymbols('0b1010')).toThrow('Binary message length 4 is not a multiple of 5');
    });

    it('should reject other digits', () => {
      expect(() => binaryToSymbols('0b10201')).toThrow(EncodingError);
    });

    it('should refuse to write non-symbols', () => {
      expect(() => symbolsToBinary([32])).toThrow(SymbolOutOfRange);
    });
  });

  describe('symbols', () => {
    it('should write comma-separated values', () => {
      expect(formatSymbolList([20, 1, 31])).toBe('20,1,31');
    });

    it('should parse commas and whitespace', () => {
      expect(parseSymbolList('20, 1 31\n')).toEqual([20, 1, 31]);
      expect(parseSymbolList('  ')).toEqual([]);
    });

    it('should reject non-symbols', () => {
      expect(() => parseSymbolList('1,32')).toThrow(SymbolOutOfRange);
      expect(() => parseSymbolList('1,32')).toThrow('Symbol at index 1 is out of range: 32 (expected integer 0-31)');
      expect(() => parseSymbolList('1,x')).toThrow('Invalid symbol "x"');
      expect(() => parseSymbolList('1,-2')).toThrow(EncodingError);
    });
  });

  describe('dispatch', () => {
    it('should select the format', () => {
      expect(formatMessage([3], 'binary')).toBe('0b00011');
      expect(formatMessage([3], 'symbols')).toBe('3');
      expect(parseMessage('0b00011', 'binary')).toEqual([3]);
      expect(parseMessage('3', 'symbols')).toEqual([3]);
    });

    it('should recognise format names', () => {
      expect(isMessageFormat('binary')).toBe(true);
      expect(isMessageFormat('symbols')).toBe(true);
      expect(isMessageFormat('hex')).toBe(false);
    });
  });
});
