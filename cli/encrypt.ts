/**
 * CLI Encrypt Command
 */

import { writeFileSync } from 'fs';
import { parseSeed } from '../src/seed/expand.js';
import { encodeText } from '../src/codec/ita2.js';
import { checkMessageSize, encryptSymbols } from '../src/cipher/index.js';
import { bitChangeRatio } from '../src/lib/stats.js';
import { sha256Hex } from '../src/lib/sha256.js';
import { formatMessage } from '../src/utils/format.js';
import { formatPercent } from '../src/utils/helpers.js';
import { createLogger, readInput, reportError, resolveFormat, type CommonOptions } from './input.js';

interface EncryptOptions extends CommonOptions {
  format: string;
  lenient?: boolean;
}

interface EncryptResult {
  success: boolean;
  ciphertext: string;
  format: string;
  symbols: number;
  bitsChanged: number;
  sha256: string;
  output?: string;
}

export function encryptCommand(text: string | undefined, options: EncryptOptions): void {
  const log = createLogger(options);

  try {
    const seed = parseSeed(options.seed);
    const format = resolveFormat(options.format);
    const input = readInput(text, options.file, log);

    const plain = encodeText(input, { substitute: options.lenient ? '?' : undefined });
    const sizeCheck = checkMessageSize(plain);
    if (sizeCheck.warning) {
      log(`Warning: ${sizeCheck.message}`);
    }

    log(`Encrypting ${plain.length} symbols...`);
    const cipher = encryptSymbols(plain, seed, { zeroPositions: options.zeroPositions });
    const ciphertext = formatMessage(cipher, format);
    const ratio = bitChangeRatio(plain, cipher);
    const checksum = sha256Hex(Uint8Array.from(plain));

    if (options.output) {
      writeFileSync(options.output, ciphertext + '\n');
    }

    if (options.json) {
      const result: EncryptResult = {
        success: true,
        ciphertext,
        format,
        symbols: cipher.length,
        bitsChanged: ratio,
        sha256: checksum,
      };
      if (options.output) {
        result.output = options.output;
      }
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    if (!options.output) {
      console.log(ciphertext);
    }

    // Final summary to stderr
    console.error(`Message: ${plain.length} symbols`);
    if (options.output) {
      console.error(`Output:  ${options.output}`);
    }
    console.error(`Bits changed: ${formatPercent(ratio)}`);
    console.error(`SHA-256: ${checksum}`);
  } catch (error) {
    reportError(error, options.json);
  }
}
