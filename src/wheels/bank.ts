/**
 * Wheel bank: 5 chi, 5 psi and 2 motor wheels
 *
 * Bank order (used for KeyState, seed expansion and dumps):
 *   chi1..chi5, psi1..psi5, mu1, mu2
 */
import { WHEEL_COUNTS, SYMBOL, type WheelPeriods } from '../utils/constants.js';
import { WheelConfigError } from '../lib/errors.js';
import { parseCamPattern, type CamPattern } from './cam.js';
import { Wheel, type WheelConfig } from './wheel.js';

/** The 12 wheel positions in bank order */
export type KeyState = readonly number[];

export const KEY_STATE_LENGTH = WHEEL_COUNTS.chi + WHEEL_COUNTS.psi + WHEEL_COUNTS.motor;

export interface WheelBankSpec {
  chi: readonly CamPattern[];
  psi: readonly CamPattern[];
  motor: readonly CamPattern[];
  positions?: KeyState;
}

/**
 * Check a period table: wheel counts, positive integer periods,
 * no two wheels of one role sharing a period.
 */
export function validatePeriods(periods: WheelPeriods): void {
  const groups: Array<[keyof WheelPeriods, readonly number[]]> = [
    ['chi', periods.chi],
    ['psi', periods.psi],
    ['motor', periods.motor],
  ];

  for (const [role, values] of groups) {
    if (values.length !== WHEEL_COUNTS[role]) {
      throw new WheelConfigError(
        `Expected ${WHEEL_COUNTS[role]} ${role} wheels, got ${values.length}`
      );
    }

    const seen = new Set<number>();
    for (const period of values) {
      if (!Number.isInteger(period) || period <= 0) {
        throw new WheelConfigError(`Invalid ${role} period: ${period}`);
      }
      if (seen.has(period)) {
        throw new WheelConfigError(`Duplicate ${role} period: ${period}`);
      }
      seen.add(period);
    }
  }
}

export class WheelBank {
  readonly chi: readonly Wheel[];
  readonly psi: readonly Wheel[];
  readonly motor1: Wheel;
  readonly motor2: Wheel;

  private constructor(chi: Wheel[], psi: Wheel[], motor1: Wheel, motor2: Wheel) {
    this.chi = chi;
    this.psi = psi;
    this.motor1 = motor1;
    this.motor2 = motor2;
  }

  /**
   * Build a bank from cam patterns (periods are the pattern lengths)
   */
  static create(spec: WheelBankSpec): WheelBank {
    validatePeriods({
      chi: spec.chi.map(p => p.length),
      psi: spec.psi.map(p => p.length),
      motor: spec.motor.map(p => p.length),
    });

    const positions = spec.positions ?? new Array<number>(KEY_STATE_LENGTH).fill(0);
    if (positions.length !== KEY_STATE_LENGTH) {
      throw new WheelConfigError(`Key state must have ${KEY_STATE_LENGTH} positions, got ${positions.length}`);
    }

    const chi = spec.chi.map((pattern, i) => new Wheel(`chi${i + 1}`, 'chi', pattern, positions[i]));
    const psiBase = WHEEL_COUNTS.chi;
    const psi = spec.psi.map(
      (pattern, i) => new Wheel(`psi${i + 1}`, 'psi', pattern, positions[psiBase + i])
    );
    const motorBase = psiBase + WHEEL_COUNTS.psi;
    const motor1 = new Wheel('mu1', 'motor1', spec.motor[0], positions[motorBase]);
    const motor2 = new Wheel('mu2', 'motor2', spec.motor[1], positions[motorBase + 1]);

    return new WheelBank(chi, psi, motor1, motor2);
  }

  /**
   * Build a bank from pin strings ('x..x' or '1001'); handy for fixed wheel settings
   */
  static fromPins(
    pins: { chi: readonly string[]; psi: readonly string[]; motor: readonly string[] },
    positions?: KeyState
  ): WheelBank {
    return WheelBank.create({
      chi: pins.chi.map(parseCamPattern),
      psi: pins.psi.map(parseCamPattern),
      motor: pins.motor.map(parseCamPattern),
      positions,
    });
  }

  /**
   * All 12 wheels in bank order
   */
  get wheels(): readonly Wheel[] {
    return [...this.chi, ...this.psi, this.motor1, this.motor2];
  }

  get periods(): WheelPeriods {
    return {
      chi: this.chi.map(w => w.period),
      psi: this.psi.map(w => w.period),
      motor: [this.motor1.period, this.motor2.period],
    };
  }

  /**
   * Current chi pins as a 5-bit value (chi1 is bit 0)
   */
  chiValue(): number {
    return combinePins(this.chi);
  }

  /**
   * Current psi pins as a 5-bit value (psi1 is bit 0)
   */
  psiValue(): number {
    return combinePins(this.psi);
  }

  keyState(): KeyState {
    return this.wheels.map(w => w.position);
  }

  setKeyState(state: KeyState): void {
    const wheels = this.wheels;
    if (state.length !== wheels.length) {
      throw new WheelConfigError(`Key state must have ${wheels.length} positions, got ${state.length}`);
    }
    // Validate all before moving any wheel
    state.forEach((position, i) => {
      const wheel = wheels[i];
      if (!Number.isInteger(position) || position < 0 || position >= wheel.period) {
        throw new WheelConfigError(
          `Wheel ${wheel.name}: position ${position} outside 0..${wheel.period - 1}`
        );
      }
    });
    state.forEach((position, i) => wheels[i].setPosition(position));
  }

  clone(): WheelBank {
    return new WheelBank(
      this.chi.map(w => w.clone()),
      this.psi.map(w => w.clone()),
      this.motor1.clone(),
      this.motor2.clone()
    );
  }

  getConfig(): WheelConfig[] {
    return this.wheels.map(w => w.getConfig());
  }
}

function combinePins(wheels: readonly Wheel[]): number {
  let value = 0;
  for (let i = 0; i < wheels.length; i++) {
    if (wheels[i].pin()) value |= 1 << i;
  }
  return value & SYMBOL.MASK;
}
