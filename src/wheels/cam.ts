/**
 * Cam patterns
 *
 * A wheel's pins as a frozen boolean array, one entry per position.
 * Text form uses 'x' (raised, true) and '.' (lowered, false),
 * the notation of the wartime wheel-breaking reports; '1' and '0' are also accepted.
 */
import { WheelConfigError } from '../lib/errors.js';

export type CamPattern = readonly boolean[];

export function createCamPattern(pins: readonly boolean[]): CamPattern {
  if (pins.length === 0) {
    throw new WheelConfigError('Cam pattern must have at least one pin');
  }
  return Object.freeze([...pins]);
}

/**
 * Parse a pattern written as 'x..xx.' or '100110'
 */
export function parseCamPattern(text: string): CamPattern {
  const pins: boolean[] = [];
  for (const ch of text) {
    if (ch === 'x' || ch === 'X' || ch === '1') {
      pins.push(true);
    } else if (ch === '.' || ch === '0') {
      pins.push(false);
    } else {
      throw new WheelConfigError(`Invalid cam character "${ch}" (use x/. or 1/0)`);
    }
  }
  return createCamPattern(pins);
}

export function formatCamPattern(pattern: CamPattern): string {
  return pattern.map(pin => (pin ? 'x' : '.')).join('');
}

/**
 * Fraction of raised pins
 */
export function camDensity(pattern: CamPattern): number {
  return pattern.filter(Boolean).length / pattern.length;
}
