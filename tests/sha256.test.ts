import { describe, it, expect } from 'vitest';
import { sha256, sha256Hex } from '../src/lib/sha256.js';
import { stringToBytes } from '../src/utils/helpers.js';

describe('SHA-256', () => {
  it('should hash empty input', () => {
    expect(sha256Hex(new Uint8Array(0))).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('should hash "abc"', () => {
    expect(sha256Hex(stringToBytes('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });

  it('should hash input spanning two blocks', () => {
    const input = stringToBytes('abcdbcdecdefdefgefghfghighijhijkijkljklmklmnlmnomnopnopq');
    expect(sha256Hex(input)).toBe(
      '248d6a61d20638b8e5c026930c3e6039a33ce45964ff2167f6ecedd419db06c1'
    );
  });

  it('should return 32 bytes', () => {
    const digest = sha256(stringToBytes('tunny'));
    expect(digest).toBeInstanceOf(Uint8Array);
    expect(digest.length).toBe(32);
  });

  it('should not modify its input', () => {
    const input = new Uint8Array([1, 2, 3]);
    sha256(input);
    expect(Array.from(input)).toEqual([1, 2, 3]);
  });
});
