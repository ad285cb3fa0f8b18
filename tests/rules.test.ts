import { describe, it, expect } from 'vitest';
import {
  DIFFICULTY_PRESETS,
  cultivationCost,
  cultivationGain,
  meditationEffect,
  nextStageThreshold,
  pillEffect,
  powerLevel,
  recommendAction,
  resolveStage,
  stageAt,
  stageThreshold,
  stagesCrossed,
  standardRules,
  type CharacterStatus,
} from '@/domain/index.js';
import { InvalidArgumentError, OutOfRangeError } from '@/utils/errors.js';

const { easy, normal, hard } = DIFFICULTY_PRESETS;

function status(overrides: Partial<CharacterStatus> = {}): CharacterStatus {
  return {
    name: '测试修士',
    hp: { current: 100, max: 100 },
    mp: { current: 50, max: 100 },
    talent: 5,
    pillCount: 1,
    totalExperience: 0,
    stage: stageAt(0),
    nextStageThreshold: 100,
    stageProgress: 0,
    meditationStreak: 0,
    totalActions: 0,
    alive: true,
    ...overrides,
  };
}

describe('meditationEffect', () => {
  it('restores 2 + talent HP and 8 + 2*talent MP on normal', () => {
    expect(meditationEffect(5, normal)).toEqual({ hpDelta: 7, mpDelta: 18 });
    expect(meditationEffect(1, normal)).toEqual({ hpDelta: 3, mpDelta: 10 });
    expect(meditationEffect(10, normal)).toEqual({ hpDelta: 12, mpDelta: 28 });
  });

  it('scales the base amount by the recovery multiplier', () => {
    expect(meditationEffect(5, hard)).toEqual({ hpDelta: 6, mpDelta: 15 });
    expect(meditationEffect(5, easy)).toEqual({ hpDelta: 7, mpDelta: 20 });
  });

  it('is strictly increasing in talent', () => {
    for (let talent = 1; talent < 10; talent++) {
      const lower = meditationEffect(talent, normal);
      const higher = meditationEffect(talent + 1, normal);
      expect(higher.hpDelta).toBeGreaterThan(lower.hpDelta);
      expect(higher.mpDelta).toBeGreaterThan(lower.mpDelta);
    }
  });

  it('rejects talent outside 1-10', () => {
    expect(() => meditationEffect(0, normal)).toThrow(InvalidArgumentError);
    expect(() => meditationEffect(11, normal)).toThrow('资质必须是 1-10 之间的整数');
    expect(() => meditationEffect(2.5, normal)).toThrow(InvalidArgumentError);
  });
});

describe('cultivationGain', () => {
  it('gives floor(12 + 1.5*talent) without a streak', () => {
    expect(cultivationGain(5, normal, 0)).toBe(19);
    expect(cultivationGain(1, normal, 0)).toBe(13);
    expect(cultivationGain(10, normal, 0)).toBe(27);
  });

  it('adds 10% per preceding meditation, capped at five', () => {
    expect(cultivationGain(5, normal, 3)).toBe(25);
    expect(cultivationGain(5, normal, 5)).toBe(29);
    expect(cultivationGain(5, normal, 12)).toBe(29);
  });

  it('applies the experience multiplier', () => {
    expect(cultivationGain(5, hard, 0)).toBe(15);
    expect(cultivationGain(5, easy, 0)).toBe(23);
    expect(cultivationGain(5, { ...normal, experienceMultiplier: 20 }, 0)).toBe(390);
  });

  it('rejects a negative streak', () => {
    expect(() => cultivationGain(5, normal, -1)).toThrow('连续打坐次数必须是非负整数');
  });

  it('costs 20 mana', () => {
    expect(cultivationCost(normal)).toBe(20);
    expect(standardRules.cultivationCost(hard)).toBe(20);
  });
});

describe('pillEffect', () => {
  it('restores 30 of each on normal, scaled by recovery', () => {
    expect(pillEffect(normal)).toEqual({ hpDelta: 30, mpDelta: 30 });
    expect(pillEffect(easy)).toEqual({ hpDelta: 39, mpDelta: 39 });
    expect(pillEffect(hard)).toEqual({ hpDelta: 21, mpDelta: 21 });
  });
});

describe('stage ladder', () => {
  it('resolves the highest tier reached', () => {
    expect(resolveStage(0).name).toBe('炼气期');
    expect(resolveStage(99).name).toBe('炼气期');
    expect(resolveStage(100).name).toBe('筑基期');
    expect(resolveStage(699).name).toBe('结丹期');
    expect(resolveStage(700).name).toBe('元婴期');
    expect(resolveStage(3099).name).toBe('化神期');
    expect(resolveStage(3100).name).toBe('飞升');
    expect(resolveStage(9999).terminal).toBe(true);
  });

  it('rejects negative experience', () => {
    expect(() => resolveStage(-1)).toThrow(InvalidArgumentError);
  });

  it('exposes thresholds', () => {
    expect(stageThreshold(2)).toBe(300);
    expect(nextStageThreshold(0)).toBe(100);
    expect(nextStageThreshold(4)).toBe(3100);
  });

  it('has no next threshold at the terminal tier', () => {
    expect(() => nextStageThreshold(5)).toThrow(OutOfRangeError);
    expect(() => nextStageThreshold(5)).toThrow('飞升已是最高境界');
    expect(() => stageAt(6)).toThrow('境界序号超出范围: 6');
  });

  it('lists every tier crossed in one jump', () => {
    expect(stagesCrossed(90, 390).map((stage) => stage.name)).toEqual(['筑基期', '结丹期']);
    expect(stagesCrossed(100, 120)).toEqual([]);
  });
});

describe('powerLevel', () => {
  it('is 100 for a fresh normal character with talent 5', () => {
    expect(powerLevel(status())).toBe(100);
  });

  it('applies the stage multiplier', () => {
    const foundation = status({ totalExperience: 100, stage: stageAt(1) });
    // (30 + 15 + 20 + 50 + 5) * 1.5
    expect(powerLevel(foundation)).toBe(180);
  });

  it('is zero when dead', () => {
    expect(powerLevel(status({ hp: { current: 0, max: 100 }, alive: false }))).toBe(0);
  });
});

describe('recommendAction', () => {
  it('suggests a balanced approach at the start', () => {
    expect(recommendAction(status())).toBe('状态适中，可以根据需要选择修炼或恢复');
  });

  it('suggests meditation when there are no pills', () => {
    expect(recommendAction(status({ pillCount: 0 }))).toBe('缺少丹药，建议多打坐积累');
  });

  it('reacts to low health and mana', () => {
    expect(recommendAction(status({ hp: { current: 20, max: 100 } }))).toBe('生命垂危，建议立即服用丹药');
    expect(recommendAction(status({ mp: { current: 10, max: 100 }, pillCount: 0 }))).toBe('仙力不足，建议打坐恢复');
  });

  it('pushes cultivation when well stocked', () => {
    expect(recommendAction(status({ mp: { current: 90, max: 100 }, pillCount: 3 }))).toBe('状态良好，建议全力修炼');
  });

  it('covers the end states', () => {
    expect(recommendAction(status({ alive: false }))).toBe('修炼失败，请重新开始');
    expect(recommendAction(status({ stage: stageAt(5) }))).toBe('已证大道，飞升成仙');
  });
});
