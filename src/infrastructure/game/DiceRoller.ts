// Infrastructure layer: Talent dice
// Testable random source with injectable implementations

import type { TalentRange } from '@/domain/cultivation/types.js';
import { InvalidArgumentError } from '@/utils/errors.js';

export interface DiceRoller {
  /** Uniform integer in [1, sides] */
  roll(sides: number): number;
}

function assertSides(sides: number): void {
  if (!Number.isInteger(sides) || sides < 1) {
    throw new InvalidArgumentError(`Dice must have at least 1 side, got: ${sides}`, { sides });
  }
}

/**
 * Standard random dice roller using Math.random()
 * Use in production
 */
export class RandomDiceRoller implements DiceRoller {
  roll(sides: number): number {
    assertSides(sides);
    return Math.floor(Math.random() * sides) + 1;
  }
}

/**
 * Fixed dice roller for testing
 * Returns predetermined values from an array
 */
export class FixedDiceRoller implements DiceRoller {
  private values: number[];

  constructor(values: number[]) {
    this.values = [...values];
  }

  roll(sides: number): number {
    assertSides(sides);
    const value = this.values.shift();
    if (value === undefined) {
      throw new Error('FixedDiceRoller: No more values available');
    }
    if (value < 1 || value > sides) {
      throw new Error(`FixedDiceRoller: Value ${value} out of range for ${sides}-sided die`);
    }
    return value;
  }

  get remaining(): number {
    return this.values.length;
  }
}

/**
 * Seeded dice for reproducible talent rolls (GAME_SEED).
 * 32-bit LCG; faces come from the high half of the state, whose low bits cycle.
 */
export class SeededDiceRoller implements DiceRoller {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed >>> 0;
  }

  roll(sides: number): number {
    assertSides(sides);
    this.state = (Math.imul(this.state, 1664525) + 1013904223) >>> 0;
    return ((this.state >>> 16) % sides) + 1;
  }
}

/**
 * Uniform integer in [range.min, range.max]
 */
export function rollInRange(roller: DiceRoller, range: TalentRange): number {
  const sides = range.max - range.min + 1;
  return range.min + roller.roll(sides) - 1;
}
