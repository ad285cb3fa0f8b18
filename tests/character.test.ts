import { describe, it, expect } from 'vitest';
import { Character, DEFAULT_CHARACTER_NAME } from '@/infrastructure/character/Character.js';
import {
  ExperienceComponent,
  HealthComponent,
  InventoryComponent,
  ManaComponent,
  TalentComponent,
} from '@/infrastructure/character/components.js';
import { standardRules } from '@/domain/cultivation/rules.js';
import { InsufficientResourceError, InvalidArgumentError } from '@/utils/errors.js';

describe('HealthComponent', () => {
  it('starts full by default', () => {
    const health = new HealthComponent(100);
    expect(health.current).toBe(100);
    expect(health.isFull()).toBe(true);
  });

  it('clamps into [0, max] and reports the applied amount', () => {
    const health = new HealthComponent(100, 90);
    expect(health.applyDelta(30)).toBe(10);
    expect(health.current).toBe(100);
    expect(health.applyDelta(-250)).toBe(-100);
    expect(health.current).toBe(0);
    expect(health.isEmpty()).toBe(true);
  });

  it('applies nothing when already full', () => {
    const health = new HealthComponent(100);
    expect(health.clampDelta(12)).toBe(0);
    expect(health.applyDelta(12)).toBe(0);
    expect(health.current).toBe(100);
  });

  it('rejects invalid pools and amounts', () => {
    expect(() => new HealthComponent(0)).toThrow('生命上限必须为正');
    expect(() => new HealthComponent(100, 101)).toThrow('生命初始值必须在 0-100 之间');
    expect(() => new HealthComponent(100).applyDelta(1.5)).toThrow(InvalidArgumentError);
  });
});

describe('ManaComponent', () => {
  it('starts at half by default', () => {
    expect(new ManaComponent(100).current).toBe(50);
    expect(new ManaComponent(7).current).toBe(3);
  });

  it('previews without mutating', () => {
    const mana = new ManaComponent(100, 50);
    expect(mana.clampDelta(80)).toBe(50);
    expect(mana.current).toBe(50);
  });
});

describe('ExperienceComponent', () => {
  it('derives the stage from the total', () => {
    const experience = new ExperienceComponent(standardRules);
    expect(experience.stage.name).toBe('炼气期');
    expect(experience.add(150).map((stage) => stage.name)).toEqual(['筑基期']);
    expect(experience.total).toBe(150);
    expect(experience.stage.name).toBe('筑基期');
  });

  it('reports progress through the current tier', () => {
    const experience = new ExperienceComponent(standardRules);
    experience.add(150);
    // 50 of the 200 between 100 and 300
    expect(experience.progress()).toBe(25);
    expect(experience.nextThreshold()).toBe(300);
  });

  it('returns every tier crossed by a large gain', () => {
    const experience = new ExperienceComponent(standardRules);
    expect(experience.preview(3100).map((stage) => stage.ordinal)).toEqual([1, 2, 3, 4, 5]);
    expect(experience.total).toBe(0);
  });

  it('has no next threshold at the terminal tier', () => {
    const experience = new ExperienceComponent(standardRules);
    experience.add(3100);
    expect(experience.nextThreshold()).toBeNull();
    expect(experience.progress()).toBe(100);
  });

  it('never decreases', () => {
    const experience = new ExperienceComponent(standardRules);
    expect(() => experience.add(-1)).toThrow('经验增量不能为负');
    expect(() => experience.add(1.5)).toThrow('经验增量必须为整数: 1.5');
    expect(experience.total).toBe(0);
  });
});

describe('TalentComponent', () => {
  it('accepts 1-10 only', () => {
    expect(new TalentComponent(1).value).toBe(1);
    expect(new TalentComponent(10).value).toBe(10);
    expect(() => new TalentComponent(0)).toThrow(InvalidArgumentError);
    expect(() => new TalentComponent(11)).toThrow(InvalidArgumentError);
  });
});

describe('InventoryComponent', () => {
  it('consumes pills one at a time', () => {
    const inventory = new InventoryComponent(2);
    expect(inventory.consume()).toBe(1);
    expect(inventory.consume()).toBe(0);
  });

  it('refuses to go below zero', () => {
    const inventory = new InventoryComponent(0);
    expect(() => inventory.consume()).toThrow(InsufficientResourceError);
    expect(() => inventory.consume()).toThrow('没有丹药可用');
    expect(() => new InventoryComponent(1).consume(3)).toThrow('丹药不足：需要3颗，现有1颗');
  });
});

describe('Character', () => {
  const init = { name: '青云', talent: 5, maxHp: 100, maxMp: 100, initialMp: 50, pillCount: 1 };

  it('projects its components into a status', () => {
    const character = new Character(init, standardRules);
    expect(character.toStatus()).toEqual({
      name: '青云',
      hp: { current: 100, max: 100 },
      mp: { current: 50, max: 100 },
      talent: 5,
      pillCount: 1,
      totalExperience: 0,
      stage: standardRules.stageAt(0),
      nextStageThreshold: 100,
      stageProgress: 0,
      meditationStreak: 0,
      totalActions: 0,
      alive: true,
    });
  });

  it('falls back to the default name', () => {
    expect(new Character({ ...init, name: '   ' }, standardRules).name).toBe(DEFAULT_CHARACTER_NAME);
  });

  it('counts consecutive meditations only', () => {
    const character = new Character(init, standardRules);
    character.recordAction('meditate');
    character.recordAction('meditate');
    expect(character.meditationStreak).toBe(2);
    character.recordAction('wait');
    expect(character.meditationStreak).toBe(0);
    expect(character.totalActions).toBe(3);
  });

  it('is alive exactly while health is positive', () => {
    const character = new Character(init, standardRules);
    character.health.applyDelta(-99);
    expect(character.isAlive()).toBe(true);
    character.health.applyDelta(-1);
    expect(character.isAlive()).toBe(false);
  });

  it('hands out copies', () => {
    const character = new Character(init, standardRules);
    const status = character.toStatus();
    status.hp.current = 1;
    expect(character.health.current).toBe(100);
  });
});
