// Wheel role (closed set; motor wheels are distinguished by their place in the chain)
export type WheelRole = 'chi' | 'psi' | 'motor1' | 'motor2';

export interface WheelPeriods {
  chi: readonly number[];
  psi: readonly number[];
  // [mu1, mu2]: mu1 is the basic motor, mu2 the limitation-driven motor
  motor: readonly number[];
}

// SZ42 wheel sizes as recorded at Bletchley Park.
// Ordered chi1..chi5, psi1..psi5, mu1 (mu61), mu2 (mu37).
export const WHEEL_PERIODS: WheelPeriods = {
  chi: [41, 31, 29, 26, 23],
  psi: [43, 47, 51, 53, 59],
  motor: [61, 37],
};

export const WHEEL_COUNTS = {
  chi: 5,
  psi: 5,
  motor: 2,
} as const;

// One teleprinter code unit
export const SYMBOL = {
  BITS: 5,
  MASK: 0x1f,
  COUNT: 32,
} as const;

// Seed expansion parameters (normative, see generateWheelBank)
export const SEED = {
  DOMAIN: 'lorenz-wheelbank/v1',
  TAG_INTEGER: 0x01,
  TAG_BYTES: 0x02,
  INTEGER_BYTES: 8,
  MAX_BYTES: 256,
  NONCE_SIZE: 12,
  CAM_STREAM: 0x00,
  POSITION_STREAM: 0x01,
} as const;

export const LIMITS = {
  MAX_MESSAGE_SYMBOLS: 1024 * 1024,  // Hard limit per encrypt/decrypt call
  SOFT_LIMIT_SYMBOLS: 64 * 1024,     // Warn above this
} as const;

// Keystream pipelining (transformStream)
export const PIPELINE = {
  BLOCK_SIZE: 256,   // Symbols per produced keystream block
  QUEUE_DEPTH: 4,    // Blocks buffered ahead of the consumer
} as const;
