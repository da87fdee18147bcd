/**
 * Error taxonomy for the cipher core and its codec
 */

export type CipherErrorCode =
  | 'CIPHER_ERROR'
  | 'INVALID_SEED'
  | 'WHEEL_CONFIG'
  | 'SYMBOL_OUT_OF_RANGE'
  | 'ENCODING';

export class CipherError extends Error {
  public readonly code: CipherErrorCode;

  constructor(message: string, code: CipherErrorCode = 'CIPHER_ERROR') {
    super(message);
    this.name = 'CipherError';
    this.code = code;
  }
}

/** Seed is empty, out of range, or not an integer / byte sequence */
export class InvalidSeed extends CipherError {
  constructor(message: string) {
    super(message, 'INVALID_SEED');
    this.name = 'InvalidSeed';
  }
}

/**
 * Bad wheel period, pattern, count or start position.
 * Unreachable with the built-in period table.
 */
export class WheelConfigError extends CipherError {
  constructor(message: string) {
    super(message, 'WHEEL_CONFIG');
    this.name = 'WheelConfigError';
  }
}

export class SymbolOutOfRange extends CipherError {
  public readonly index: number;
  public readonly value: number;

  constructor(index: number, value: number) {
    super(`Symbol at index ${index} is out of range: ${value} (expected integer 0-31)`, 'SYMBOL_OUT_OF_RANGE');
    this.name = 'SymbolOutOfRange';
    this.index = index;
    this.value = value;
  }
}

/** Raised by the ITA2 codec and the ciphertext text formats */
export class EncodingError extends CipherError {
  constructor(message: string) {
    super(message, 'ENCODING');
    this.name = 'EncodingError';
  }
}
