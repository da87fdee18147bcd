/**
 * CLI Decrypt Command
 */

import { writeFileSync } from 'fs';
import { parseSeed } from '../src/seed/expand.js';
import { decodeSymbols } from '../src/codec/ita2.js';
import { decryptSymbols } from '../src/cipher/index.js';
import { sha256Hex } from '../src/lib/sha256.js';
import { parseMessage } from '../src/utils/format.js';
import { createLogger, readInput, reportError, resolveFormat, type CommonOptions } from './input.js';

interface DecryptOptions extends CommonOptions {
  format: string;
}

interface DecryptResult {
  success: boolean;
  message: string;
  symbols: number;
  sha256: string;
  output?: string;
}

export function decryptCommand(ciphertext: string | undefined, options: DecryptOptions): void {
  const log = createLogger(options);

  try {
    const seed = parseSeed(options.seed);
    const format = resolveFormat(options.format);
    const input = readInput(ciphertext, options.file, log);

    const cipher = parseMessage(input, format);
    log(`Decrypting ${cipher.length} symbols...`);
    const plain = decryptSymbols(cipher, seed, { zeroPositions: options.zeroPositions });
    const text = decodeSymbols(plain);
    const checksum = sha256Hex(Uint8Array.from(plain));

    if (options.output) {
      writeFileSync(options.output, text);
    }

    if (options.json) {
      const result: DecryptResult = {
        success: true,
        message: text,
        symbols: plain.length,
        sha256: checksum,
      };
      if (options.output) {
        result.output = options.output;
      }
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    if (!options.output) {
      console.log(text);
    }

    console.error(`Message: ${plain.length} symbols`);
    if (options.output) {
      console.error(`Output:  ${options.output}`);
    }
    console.error(`SHA-256: ${checksum}`);
  } catch (error) {
    reportError(error, options.json);
  }
}
