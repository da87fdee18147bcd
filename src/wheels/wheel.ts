/**
 * A single Lorenz wheel: fixed cam pattern plus current rotational offset
 */
import type { WheelRole } from '../utils/constants.js';
import { WheelConfigError } from '../lib/errors.js';
import { createCamPattern, formatCamPattern, type CamPattern } from './cam.js';

export interface WheelConfig {
  name: string;
  role: WheelRole;
  period: number;
  position: number;
  pins: string;
}

export class Wheel {
  readonly name: string;
  readonly role: WheelRole;
  readonly pattern: CamPattern;
  private offset: number;

  constructor(name: string, role: WheelRole, pattern: CamPattern, position = 0) {
    if (pattern.length === 0) {
      throw new WheelConfigError(`Wheel ${name} has an empty cam pattern`);
    }
    this.name = name;
    this.role = role;
    // Frozen patterns are shared, others copied
    this.pattern = Object.isFrozen(pattern) ? pattern : createCamPattern(pattern);
    this.offset = 0;
    this.setPosition(position);
  }

  get period(): number {
    return this.pattern.length;
  }

  get position(): number {
    return this.offset;
  }

  /**
   * Pin under the reading head
   */
  pin(): boolean {
    return this.pattern[this.offset];
  }

  step(): void {
    this.offset = (this.offset + 1) % this.pattern.length;
  }

  setPosition(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position >= this.pattern.length) {
      throw new WheelConfigError(
        `Wheel ${this.name}: position ${position} outside 0..${this.pattern.length - 1}`
      );
    }
    this.offset = position;
  }

  clone(): Wheel {
    return new Wheel(this.name, this.role, this.pattern, this.offset);
  }

  getConfig(): WheelConfig {
    return {
      name: this.name,
      role: this.role,
      period: this.period,
      position: this.offset,
      pins: formatCamPattern(this.pattern),
    };
  }
}
