import { describe, it, expect, vi } from 'vitest';
import { transform, validateMessage, isSymbol } from '../src/cipher/transform.js';
import { KeystreamGenerator } from '../src/keystream/generator.js';
import { SymbolOutOfRange } from '../src/lib/errors.js';

describe('transform', () => {
  it('should XOR each symbol with the next keystream symbol', () => {
    const keystream = [1, 2, 4, 31];
    let i = 0;
    const source = { next: () => keystream[i++] };

    expect(transform([0, 3, 4, 31], source)).toEqual([1, 1, 0, 0]);
  });

  it('should make no generator calls for an empty message', () => {
    const next = vi.fn(() => 0);
    expect(transform([], { next })).toEqual([]);
    expect(next).not.toHaveBeenCalled();
  });

  it('should call the generator once per symbol, in order', () => {
    const next = vi.fn(() => 0);
    transform([5, 6, 7], { next });
    expect(next).toHaveBeenCalledTimes(3);
  });

  it('should reject out-of-range symbols before drawing keystream', () => {
    const next = vi.fn(() => 0);

    expect(() => transform([1, 2, 32], { next })).toThrow(SymbolOutOfRange);
    expect(next).not.toHaveBeenCalled();
  });

  it('should report the offending index and value', () => {
    try {
      transform([0, -1], { next: () => 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SymbolOutOfRange);
      if (error instanceof SymbolOutOfRange) {
        expect(error.index).toBe(1);
        expect(error.value).toBe(-1);
        expect(error.code).toBe('SYMBOL_OUT_OF_RANGE');
      }
    }
  });

  it('should invert itself with fresh generators from one seed', () => {
    const message = Array.from({ length: 64 }, (_, i) => (i * 7) % 32);
    const cipher = transform(message, KeystreamGenerator.fromSeed(42));
    const plain = transform(cipher, KeystreamGenerator.fromSeed(42));

    expect(plain).toEqual(message);
  });

  it('should not invert with a generator that was already advanced', () => {
    const message = Array.from({ length: 32 }, (_, i) => i);
    const cipher = transform(message, KeystreamGenerator.fromSeed(42));

    const used = KeystreamGenerator.fromSeed(42);
    used.next();
    expect(transform(cipher, used)).not.toEqual(message);
  });
});

describe('isSymbol / validateMessage', () => {
  it('should accept integers 0..31 only', () => {
    expect(isSymbol(0)).toBe(true);
    expect(isSymbol(31)).toBe(true);
    expect(isSymbol(32)).toBe(false);
    expect(isSymbol(-1)).toBe(false);
    expect(isSymbol(1.5)).toBe(false);
    expect(isSymbol(Number.NaN)).toBe(false);
  });

  it('should throw for the first bad symbol', () => {
    expect(() => validateMessage([0, 40, 50])).toThrow('Symbol at index 1 is out of range: 40');
  });
});
