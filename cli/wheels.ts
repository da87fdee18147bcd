/**
 * CLI Wheels Command - dump the wheel settings a seed expands to
 */

import { generateWheelBank, parseSeed } from '../src/seed/expand.js';
import { reportError } from './input.js';

interface WheelsOptions {
  seed: string;
  zeroPositions?: boolean;
  json?: boolean;
}

export function wheelsCommand(options: WheelsOptions): void {
  try {
    const bank = generateWheelBank(parseSeed(options.seed), { zeroPositions: options.zeroPositions });
    const wheels = bank.getConfig();

    if (options.json) {
      console.log(JSON.stringify({ success: true, seed: options.seed, wheels }, null, 2));
      return;
    }

    for (const wheel of wheels) {
      console.log(
        `${wheel.name.padEnd(4)}  period ${String(wheel.period).padStart(2)}  start ${String(wheel.position).padStart(2)}  ${wheel.pins}`
      );
    }
  } catch (error) {
    reportError(error, options.json);
  }
}
