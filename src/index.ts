/**
 * Lorenz SZ40/42 ("Tunny") cipher simulator - public API
 */
export { WHEEL_PERIODS, SYMBOL, LIMITS, type WheelPeriods, type WheelRole } from './utils/constants.js';
export {
  CipherError,
  InvalidSeed,
  WheelConfigError,
  SymbolOutOfRange,
  EncodingError,
  type CipherErrorCode,
} from './lib/errors.js';
export { createCamPattern, parseCamPattern, formatCamPattern, type CamPattern } from './wheels/cam.js';
export { Wheel, type WheelConfig } from './wheels/wheel.js';
export { WheelBank, validatePeriods, type KeyState, type WheelBankSpec } from './wheels/bank.js';
export {
  generateWheelBank,
  generateWheelBank as generate,
  parseSeed,
  encodeSeed,
  type Seed,
  type GenerateOptions,
} from './seed/expand.js';
export { KeystreamGenerator, type SymbolSource } from './keystream/generator.js';
export { transform, validateMessage, isSymbol, type Message } from './cipher/transform.js';
export { transformStream, collect, KeystreamQueue, type PipelineOptions } from './cipher/pipeline.js';
export {
  encrypt,
  decrypt,
  encryptSymbols,
  decryptSymbols,
  checkMessageSize,
  type CipherOptions,
} from './cipher/index.js';
export { encodeText, decodeSymbols, isEncodable, FIGS, LTRS } from './codec/ita2.js';
export { bitChangeRatio } from './lib/stats.js';
export { formatMessage, parseMessage, type MessageFormat } from './utils/format.js';
