import { describe, it, expect } from 'vitest';
import {
  encrypt,
  decrypt,
  encryptSymbols,
  decryptSymbols,
  checkMessageSize,
} from '../src/cipher/index.js';
import { encodeText } from '../src/codec/ita2.js';
import { KeystreamGenerator } from '../src/keystream/generator.js';
import { LIMITS } from '../src/utils/constants.js';
import { CipherError, EncodingError, InvalidSeed, SymbolOutOfRange } from '../src/lib/errors.js';

describe('Cipher operations', () => {
  describe('checkMessageSize', () => {
    it('should accept small messages', () => {
      const result = checkMessageSize(new Array(100).fill(0));
      expect(result.valid).toBe(true);
      expect(result.warning).toBe(false);
    });

    it('should warn for large messages', () => {
      const result = checkMessageSize(new Array(LIMITS.SOFT_LIMIT_SYMBOLS + 1).fill(0));
      expect(result.valid).toBe(true);
      expect(result.warning).toBe(true);
    });

    it('should reject oversized messages', () => {
      const result = checkMessageSize(new Array(LIMITS.MAX_MESSAGE_SYMBOLS + 1).fill(0));
      expect(result.valid).toBe(false);
    });

    it('should make encryptSymbols throw for oversized messages', () => {
      const huge = new Array(LIMITS.MAX_MESSAGE_SYMBOLS + 1).fill(0);
      expect(() => encryptSymbols(huge, 1)).toThrow(CipherError);
    });
  });

  describe('HELLO with seed 42', () => {
    const hello = encodeText('HELLO');

    it('should encrypt to a fixed ciphertext', () => {
      const first = encrypt('HELLO', 42);
      const second = encrypt('HELLO', 42);

      expect(first).toHaveLength(5);
      expect(first).toEqual(second);
      expect(first).toEqual(encryptSymbols(hello, 42));
    });

    it('should match the known ciphertext', () => {
      expect(encrypt('HELLO', 42)).toEqual([14, 15, 16, 12, 6]);
      expect(encrypt('HELLO', new Uint8Array([0x5e, 0xed]))).toEqual([1, 20, 18, 4, 29]);
    });

    it('should leave the wheels at the known key state', () => {
      const generator = KeystreamGenerator.fromSeed(42);
      generator.fill(5);
      expect(generator.keyState()).toEqual([6, 21, 26, 14, 21, 27, 6, 43, 38, 16, 1, 20]);
    });

    it('should decrypt back to HELLO', () => {
      const cipher = encrypt('HELLO', 42);
      expect(decryptSymbols(cipher, 42)).toEqual(hello);
      expect(decrypt(cipher, 42)).toBe('HELLO');
    });

    it('should treat number and bigint seed 42 the same', () => {
      expect(encrypt('HELLO', 42n)).toEqual(encrypt('HELLO', 42));
    });
  });

  describe('round trip', () => {
    const seeds = [0, 1, 42, 65535, 2 ** 40, new Uint8Array([0xde, 0xad, 0xbe, 0xef])];

    for (const seed of seeds) {
      it(`should recover messages of length 0..40 for seed ${String(seed)}`, () => {
        for (let length = 0; length <= 40; length++) {
          const message = Array.from({ length }, (_, i) => (i * 11 + length) % 32);
          expect(decryptSymbols(encryptSymbols(message, seed), seed)).toEqual(message);
        }
      });
    }

    it('should recover text through the ITA2 codec', () => {
      const text = 'RENDEZVOUS 2300 HRS, GRID 41/17.\r\n';
      expect(decrypt(encrypt(text, 1944), 1944)).toBe(text);
    });

    it('should recover substituted text as question marks', () => {
      expect(decrypt(encrypt('A*B', 3, { substitute: '?' }), 3)).toBe('A?B');
    });

    it('should round trip with zero start positions', () => {
      const cipher = encrypt('ZERO', 5, { zeroPositions: true });
      expect(decrypt(cipher, 5, { zeroPositions: true })).toBe('ZERO');
    });
  });

  describe('non-degeneracy', () => {
    it('should give different ciphertexts for different seeds', () => {
      const message = encodeText('MEET AT THE BRIDGE');
      let different = 0;
      const trials = 50;
      for (let seed = 0; seed < trials; seed++) {
        const a = encryptSymbols(message, seed);
        const b = encryptSymbols(message, seed + 1000);
        if (a.some((symbol, i) => symbol !== b[i])) different++;
      }
      expect(different).toBeGreaterThanOrEqual(48);
    });

    it('should not leave a long message unchanged', () => {
      const message = encodeText('NOTHING TO SEE HERE');
      expect(encryptSymbols(message, 42)).not.toEqual(message);
    });
  });

  describe('boundary', () => {
    it('should map the empty message to itself', () => {
      expect(encryptSymbols([], 42)).toEqual([]);
      expect(encrypt('', 42)).toEqual([]);
      expect(decrypt([], 42)).toBe('');
    });
  });

  describe('errors', () => {
    it('should surface codec errors unchanged', () => {
      expect(() => encrypt('50%', 42)).toThrow(EncodingError);
    });

    it('should reject invalid seeds', () => {
      expect(() => encrypt('HELLO', -1)).toThrow(InvalidSeed);
      expect(() => decrypt([1, 2], new Uint8Array(0))).toThrow(InvalidSeed);
    });

    it('should reject out-of-range ciphertext', () => {
      expect(() => decrypt([1, 2, 33], 42)).toThrow(SymbolOutOfRange);
    });
  });
});
