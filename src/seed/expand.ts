/**
 * Seed expansion: seed -> WheelBank
 *
 * Normative algorithm, reproducible in any language:
 *
 *   seedBytes  integer seed: 8 bytes big-endian, tag 0x01
 *              byte seed:    the bytes as given,  tag 0x02
 *   key        SHA-256( "lorenz-wheelbank/v1" || 0x00 || tag || seedBytes )
 *
 *   Cam stream       ChaCha20 (RFC 8439), key, nonce 00*12, block counter from 0.
 *                    Bytes in order, bits least-significant first. For each wheel
 *                    in bank order draw `period` bits; bit i is pin i (1 = raised).
 *   Position stream  ChaCha20, key, nonce 01 00*11, block counter from 0.
 *                    For each wheel in bank order read a 32-bit little-endian
 *                    unsigned integer u; start position = u mod period.
 */
import { chacha20 } from '@noble/ciphers/chacha.js';
import { SEED, WHEEL_PERIODS, type WheelPeriods } from '../utils/constants.js';
import { concatBytes, hexToBytes, stringToBytes } from '../utils/helpers.js';
import { sha256 } from '../lib/sha256.js';
import { InvalidSeed } from '../lib/errors.js';
import { createCamPattern, type CamPattern } from '../wheels/cam.js';
import { WheelBank, validatePeriods } from '../wheels/bank.js';

export type Seed = number | bigint | Uint8Array;

export interface GenerateOptions {
  periods?: WheelPeriods;
  // Start every wheel at position 0 instead of drawing start positions
  zeroPositions?: boolean;
}

const BLOCK_SIZE = 64;
const MAX_INTEGER_SEED = 1n << 64n;

/**
 * Canonical byte form of a seed, with its type tag
 */
export function encodeSeed(seed: Seed): { tag: number; bytes: Uint8Array } {
  if (seed instanceof Uint8Array) {
    if (seed.length === 0) {
      throw new InvalidSeed('Seed bytes must not be empty');
    }
    if (seed.length > SEED.MAX_BYTES) {
      throw new InvalidSeed(`Seed exceeds ${SEED.MAX_BYTES} bytes (${seed.length})`);
    }
    return { tag: SEED.TAG_BYTES, bytes: new Uint8Array(seed) };
  }

  let value: bigint;
  if (typeof seed === 'number') {
    if (!Number.isSafeInteger(seed) || seed < 0) {
      throw new InvalidSeed(`Integer seed must be a non-negative safe integer, got ${seed}`);
    }
    value = BigInt(seed);
  } else {
    if (seed < 0n || seed >= MAX_INTEGER_SEED) {
      throw new InvalidSeed(`Integer seed must be in [0, 2^64), got ${seed}`);
    }
    value = seed;
  }

  const bytes = new Uint8Array(SEED.INTEGER_BYTES);
  new DataView(bytes.buffer).setBigUint64(0, value, false);
  return { tag: SEED.TAG_INTEGER, bytes };
}

/**
 * Parse a seed from text: decimal digits are an integer seed,
 * 0x-prefixed even-length hex is a byte seed.
 */
export function parseSeed(text: string): Seed {
  const trimmed = text.trim();

  if (/^\d+$/.test(trimmed)) {
    const value = BigInt(trimmed);
    encodeSeed(value);
    return value;
  }

  if (/^0x/i.test(trimmed)) {
    const bytes = hexToBytes(trimmed.slice(2));
    if (bytes === null || bytes.length === 0) {
      throw new InvalidSeed(`Invalid hex seed "${trimmed}" (expected 0x followed by whole bytes)`);
    }
    encodeSeed(bytes);
    return bytes;
  }

  throw new InvalidSeed(`Invalid seed "${text}" (use a decimal integer or 0x-prefixed hex bytes)`);
}

export function deriveSeedKey(seed: Seed): Uint8Array {
  const { tag, bytes } = encodeSeed(seed);
  return sha256(concatBytes(
    stringToBytes(SEED.DOMAIN),
    new Uint8Array([0x00, tag]),
    bytes
  ));
}

/**
 * Counter-mode ChaCha20 keystream read as bits or 32-bit words
 */
export class SeedStream {
  private readonly key: Uint8Array;
  private readonly nonce: Uint8Array;
  private block: Uint8Array = new Uint8Array(0);
  private counter = 0;
  private byteIndex = 0;
  private bitIndex = 0;

  constructor(key: Uint8Array, streamId: number) {
    this.key = key;
    this.nonce = new Uint8Array(SEED.NONCE_SIZE);
    this.nonce[0] = streamId;
  }

  /**
   * Next bit, least-significant bit of each byte first
   */
  nextBit(): number {
    if (this.bitIndex === 0) {
      this.ensureByte();
    }
    const bit = (this.block[this.byteIndex] >> this.bitIndex) & 1;
    this.bitIndex++;
    if (this.bitIndex === 8) {
      this.bitIndex = 0;
      this.byteIndex++;
    }
    return bit;
  }

  nextByte(): number {
    if (this.bitIndex !== 0) {
      // Drop the rest of a partly read byte
      this.bitIndex = 0;
      this.byteIndex++;
    }
    this.ensureByte();
    return this.block[this.byteIndex++];
  }

  /**
   * Next unsigned 32-bit little-endian word
   */
  nextUint32(): number {
    const b0 = this.nextByte();
    const b1 = this.nextByte();
    const b2 = this.nextByte();
    const b3 = this.nextByte();
    return (b0 | (b1 << 8) | (b2 << 16) | (b3 << 24)) >>> 0;
  }

  private ensureByte(): void {
    if (this.byteIndex < this.block.length) return;
    this.block = chacha20(this.key, this.nonce, new Uint8Array(BLOCK_SIZE), undefined, this.counter);
    this.counter++;
    this.byteIndex = 0;
  }
}

/**
 * Build the wheel bank for a seed. Pure: same seed, same bank.
 */
export function generateWheelBank(seed: Seed, options: GenerateOptions = {}): WheelBank {
  const periods = options.periods ?? WHEEL_PERIODS;
  validatePeriods(periods);

  const key = deriveSeedKey(seed);
  const order = [...periods.chi, ...periods.psi, ...periods.motor];

  const cams = new SeedStream(key, SEED.CAM_STREAM);
  const patterns: CamPattern[] = order.map(period =>
    createCamPattern(Array.from({ length: period }, () => cams.nextBit() === 1))
  );

  const starts = new SeedStream(key, SEED.POSITION_STREAM);
  const positions = order.map(period =>
    options.zeroPositions ? 0 : starts.nextUint32() % period
  );

  const chiEnd = periods.chi.length;
  const psiEnd = chiEnd + periods.psi.length;
  return WheelBank.create({
    chi: patterns.slice(0, chiEnd),
    psi: patterns.slice(chiEnd, psiEnd),
    motor: patterns.slice(psiEnd),
    positions,
  });
}
