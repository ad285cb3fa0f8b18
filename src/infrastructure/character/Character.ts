// Infrastructure: Character aggregate
// Implements ICharacter from domain by composing the components

import type { CharacterInit, ICharacter } from '@/domain/character/types.js';
import type { StageTable } from '@/domain/game/types.js';
import type { ActionKind, CharacterStatus, StageLevel } from '@/domain/cultivation/types.js';
import {
  ExperienceComponent,
  HealthComponent,
  InventoryComponent,
  ManaComponent,
  TalentComponent,
} from './components.js';

export const DEFAULT_CHARACTER_NAME = '无名修士';

export class Character implements ICharacter {
  readonly name: string;
  readonly health: HealthComponent;
  readonly mana: ManaComponent;
  readonly experience: ExperienceComponent;
  readonly talent: TalentComponent;
  readonly inventory: InventoryComponent;

  private streak = 0;
  private actions = 0;

  constructor(init: CharacterInit, stages: StageTable) {
    this.name = init.name.trim() || DEFAULT_CHARACTER_NAME;
    this.health = new HealthComponent(init.maxHp);
    this.mana = new ManaComponent(init.maxMp, init.initialMp);
    this.experience = new ExperienceComponent(stages);
    this.talent = new TalentComponent(init.talent);
    this.inventory = new InventoryComponent(init.pillCount);
  }

  get meditationStreak(): number {
    return this.streak;
  }

  get totalActions(): number {
    return this.actions;
  }

  // ========== Derived ==========

  isAlive(): boolean {
    return this.health.current > 0;
  }

  currentStage(): StageLevel {
    return this.experience.stage;
  }

  // ========== Counters ==========

  /**
   * Only consecutive meditations build a streak; anything else breaks it.
   */
  recordAction(kind: ActionKind): void {
    this.streak = kind === 'meditate' ? this.streak + 1 : 0;
    this.actions += 1;
  }

  // ========== Projection ==========

  toStatus(): CharacterStatus {
    return {
      name: this.name,
      hp: { current: this.health.current, max: this.health.max },
      mp: { current: this.mana.current, max: this.mana.max },
      talent: this.talent.value,
      pillCount: this.inventory.pillCount,
      totalExperience: this.experience.total,
      stage: { ...this.experience.stage },
      nextStageThreshold: this.experience.nextThreshold(),
      stageProgress: this.experience.progress(),
      meditationStreak: this.streak,
      totalActions: this.actions,
      alive: this.isAlive(),
    };
  }
}
