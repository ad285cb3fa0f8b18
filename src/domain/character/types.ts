// Domain layer: Character types
// Pure TypeScript - no external dependencies

import type {
  ActionKind,
  CharacterStatus,
  StageLevel,
} from '@/domain/cultivation/types.js';

/**
 * A resource held in [0, max]. Health and mana share this shape.
 */
export interface BoundedResource {
  readonly current: number;
  readonly max: number;

  /** Amount that applyDelta would actually apply, without mutating */
  clampDelta(amount: number): number;

  /** Clamp into [0, max]; returns the applied amount */
  applyDelta(amount: number): number;

  isFull(): boolean;
  isEmpty(): boolean;
}

export interface ExperienceTrack {
  readonly total: number;
  readonly stage: StageLevel;

  /** Add non-negative experience; returns every tier crossed, ascending */
  add(delta: number): StageLevel[];

  /** Tiers that adding `delta` would cross, without mutating */
  preview(delta: number): StageLevel[];

  /** Threshold of the next tier, or null at the terminal tier */
  nextThreshold(): number | null;

  /** Percentage of the way through the current tier, 0-100 */
  progress(): number;
}

export interface Inventory {
  readonly pillCount: number;

  /** Remove n pills; returns the new count */
  consume(n?: number): number;
}

export interface Talent {
  readonly value: number;
}

export interface CharacterInit {
  name: string;
  talent: number;
  maxHp: number;
  maxMp: number;
  initialMp: number;
  pillCount: number;
}

// ICharacter interface for the aggregate
export interface ICharacter {
  readonly name: string;
  readonly health: BoundedResource;
  readonly mana: BoundedResource;
  readonly experience: ExperienceTrack;
  readonly talent: Talent;
  readonly inventory: Inventory;
  readonly meditationStreak: number;
  readonly totalActions: number;

  // Derived
  isAlive(): boolean;
  currentStage(): StageLevel;

  // Counters
  recordAction(kind: ActionKind): void;

  // Projection
  toStatus(): CharacterStatus;
}
