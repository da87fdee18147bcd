/**
 * Keystream generator with SZ42 limited motion
 *
 * Each call to next() emits chi XOR psi for the current wheel positions,
 * then moves the wheels:
 *   1. mu1 steps every time
 *   2. mu2 steps only if mu1's pin was raised before mu1 moved
 *   3. every chi wheel steps
 *   4. the psi wheels step together, only if mu2's pin (after 2) is raised
 *
 * There is no skip-ahead: position N is reached by simulating 0..N-1.
 */
import { generateWheelBank, type GenerateOptions, type Seed } from '../seed/expand.js';
import type { KeyState, WheelBank } from '../wheels/bank.js';
import type { WheelConfig } from '../wheels/wheel.js';

/** Anything that yields keystream symbols one at a time */
export interface SymbolSource {
  next(): number;
}

export class KeystreamGenerator implements SymbolSource {
  private readonly bank: WheelBank;
  private stepCount = 0;

  /**
   * The bank is cloned; the generator owns its wheels exclusively.
   */
  constructor(bank: WheelBank) {
    this.bank = bank.clone();
  }

  static fromSeed(seed: Seed, options?: GenerateOptions): KeystreamGenerator {
    return new KeystreamGenerator(generateWheelBank(seed, options));
  }

  next(): number {
    const { motor1, motor2 } = this.bank;
    const symbol = this.bank.chiValue() ^ this.bank.psiValue();

    const motor1Pin = motor1.pin();
    motor1.step();
    if (motor1Pin) {
      motor2.step();
    }

    for (const wheel of this.bank.chi) {
      wheel.step();
    }

    if (motor2.pin()) {
      for (const wheel of this.bank.psi) {
        wheel.step();
      }
    }

    this.stepCount++;
    return symbol;
  }

  /**
   * Next `count` keystream symbols
   */
  fill(count: number): Uint8Array {
    const out = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      out[i] = this.next();
    }
    return out;
  }

  get steps(): number {
    return this.stepCount;
  }

  keyState(): KeyState {
    return this.bank.keyState();
  }

  getConfig(): WheelConfig[] {
    return this.bank.getConfig();
  }
}
