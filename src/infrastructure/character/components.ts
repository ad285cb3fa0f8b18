// Infrastructure: Character components
// Independent data holders, each enforcing its own bounds

import type {
  BoundedResource,
  ExperienceTrack,
  Inventory,
  Talent,
} from '@/domain/character/types.js';
import type { StageTable } from '@/domain/game/types.js';
import type { StageLevel } from '@/domain/cultivation/types.js';
import { MAX_TALENT, MIN_TALENT } from '@/domain/cultivation/difficulty.js';
import { InsufficientResourceError, InvalidArgumentError } from '@/utils/errors.js';

function assertInteger(value: number, field: string): void {
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${field} 必须是整数`, { [field]: value });
  }
}

function assertPool(max: number, initial: number, label: string): void {
  assertInteger(max, 'max');
  assertInteger(initial, 'initial');
  if (max < 1) {
    throw new InvalidArgumentError(`${label}上限必须为正`, { max });
  }
  if (initial < 0 || initial > max) {
    throw new InvalidArgumentError(`${label}初始值必须在 0-${max} 之间`, { initial, max });
  }
}

function clampedDelta(current: number, max: number, amount: number): number {
  const next = Math.min(max, Math.max(0, current + amount));
  return next - current;
}

// ========== Health ==========

export class HealthComponent implements BoundedResource {
  readonly max: number;
  private value: number;

  constructor(max: number, initial: number = max) {
    assertPool(max, initial, '生命');
    this.max = max;
    this.value = initial;
  }

  get current(): number {
    return this.value;
  }

  clampDelta(amount: number): number {
    assertInteger(amount, 'amount');
    return clampedDelta(this.value, this.max, amount);
  }

  applyDelta(amount: number): number {
    const applied = this.clampDelta(amount);
    this.value += applied;
    return applied;
  }

  isFull(): boolean {
    return this.value === this.max;
  }

  isEmpty(): boolean {
    return this.value === 0;
  }
}

// ========== Mana ==========

export class ManaComponent implements BoundedResource {
  readonly max: number;
  private value: number;

  constructor(max: number, initial: number = Math.floor(max / 2)) {
    assertPool(max, initial, '仙力');
    this.max = max;
    this.value = initial;
  }

  get current(): number {
    return this.value;
  }

  clampDelta(amount: number): number {
    assertInteger(amount, 'amount');
    return clampedDelta(this.value, this.max, amount);
  }

  applyDelta(amount: number): number {
    const applied = this.clampDelta(amount);
    this.value += applied;
    return applied;
  }

  isFull(): boolean {
    return this.value === this.max;
  }

  isEmpty(): boolean {
    return this.value === 0;
  }
}

// ========== Experience ==========

/**
 * Cumulative experience. The stage is always re-derived from the total,
 * so it can only move when the total does.
 */
export class ExperienceComponent implements ExperienceTrack {
  private value = 0;

  constructor(private stages: StageTable) {}

  get total(): number {
    return this.value;
  }

  get stage(): StageLevel {
    return this.stages.resolveStage(this.value);
  }

  add(delta: number): StageLevel[] {
    const crossed = this.preview(delta);
    this.value += delta;
    return crossed;
  }

  preview(delta: number): StageLevel[] {
    if (!Number.isInteger(delta)) {
      throw new InvalidArgumentError(`经验增量必须为整数: ${delta}`, { delta });
    }
    if (delta < 0) {
      throw new InvalidArgumentError('经验增量不能为负', { delta });
    }

    const from = this.stage.ordinal;
    const to = this.stages.resolveStage(this.value + delta).ordinal;
    const crossed: StageLevel[] = [];
    for (let ordinal = from + 1; ordinal <= to; ordinal++) {
      crossed.push(this.stages.stageAt(ordinal));
    }
    return crossed;
  }

  nextThreshold(): number | null {
    const stage = this.stage;
    if (stage.terminal) {
      return null;
    }
    return this.stages.stageAt(stage.ordinal + 1).threshold;
  }

  progress(): number {
    const next = this.nextThreshold();
    if (next === null) {
      return 100;
    }
    const floor = this.stage.threshold;
    return Math.floor(((this.value - floor) / (next - floor)) * 100);
  }
}

// ========== Talent ==========

export class TalentComponent implements Talent {
  readonly value: number;

  constructor(value: number) {
    if (!Number.isInteger(value) || value < MIN_TALENT || value > MAX_TALENT) {
      throw new InvalidArgumentError(`资质必须是 ${MIN_TALENT}-${MAX_TALENT} 之间的整数`, { talent: value });
    }
    this.value = value;
  }
}

// ========== Inventory ==========

export class InventoryComponent implements Inventory {
  private pills: number;

  constructor(initialPills: number) {
    if (!Number.isInteger(initialPills) || initialPills < 0) {
      throw new InvalidArgumentError('丹药数量必须是非负整数', { initialPills });
    }
    this.pills = initialPills;
  }

  get pillCount(): number {
    return this.pills;
  }

  consume(n = 1): number {
    if (!Number.isInteger(n) || n < 1) {
      throw new InvalidArgumentError('消耗数量必须是正整数', { n });
    }
    if (n > this.pills) {
      const message = this.pills === 0 ? '没有丹药可用' : `丹药不足：需要${n}颗，现有${this.pills}颗`;
      throw new InsufficientResourceError(message, { requested: n, available: this.pills });
    }
    this.pills -= n;
    return this.pills;
  }
}
