import { describe, it, expect } from 'vitest';
import {
  DIFFICULTY_PRESETS,
  findDifficultyPreset,
  listDifficultyPresets,
  resolveDifficulty,
  validateDifficulty,
} from '@/domain/cultivation/difficulty.js';
import { InvalidArgumentError } from '@/utils/errors.js';
import { customDifficulty } from './helpers.js';

describe('difficulty presets', () => {
  it('lists easy, normal and hard', () => {
    expect(listDifficultyPresets().map((preset) => preset.id)).toEqual(['easy', 'normal', 'hard']);
  });

  it('carries the documented settings', () => {
    expect(DIFFICULTY_PRESETS.easy).toMatchObject({
      talentRange: { min: 5, max: 10 },
      initialPillCount: 3,
      experienceMultiplier: 1.2,
      recoveryMultiplier: 1.3,
    });
    expect(DIFFICULTY_PRESETS.hard).toMatchObject({
      talentRange: { min: 1, max: 6 },
      initialPillCount: 0,
      experienceMultiplier: 0.8,
      recoveryMultiplier: 0.7,
    });
  });

  it('finds presets by id or label', () => {
    expect(findDifficultyPreset('normal')?.label).toBe('普通');
    expect(findDifficultyPreset('困难')?.id).toBe('hard');
    expect(findDifficultyPreset('nightmare')).toBeUndefined();
  });

  it('returns copies', () => {
    const preset = resolveDifficulty('easy');
    expect(preset).not.toBe(DIFFICULTY_PRESETS.easy);
    expect(preset).toEqual(DIFFICULTY_PRESETS.easy);
  });
});

describe('resolveDifficulty', () => {
  it('rejects unknown names', () => {
    expect(() => resolveDifficulty('nightmare')).toThrow('未知难度: nightmare');
  });

  it('validates custom settings', () => {
    const settings = resolveDifficulty(customDifficulty({ experienceMultiplier: 20 }));
    expect(settings.experienceMultiplier).toBe(20);
    expect(Object.isFrozen(settings)).toBe(true);
  });
});

describe('validateDifficulty', () => {
  it('rejects an empty talent range', () => {
    expect(() => validateDifficulty(customDifficulty({ talentRange: { min: 6, max: 3 } }))).toThrow(
      InvalidArgumentError
    );
  });

  it('rejects a talent range outside 1-10', () => {
    expect(() => validateDifficulty(customDifficulty({ talentRange: { min: 0, max: 5 } }))).toThrow(
      '难度配置无效: talentRange must lie within 1-10'
    );
  });

  it('collects every problem', () => {
    try {
      validateDifficulty(customDifficulty({ initialPillCount: -1, recoveryMultiplier: 0 }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      if (error instanceof InvalidArgumentError) {
        expect(error.details?.problems).toEqual([
          'initialPillCount must be a non-negative integer',
          'recoveryMultiplier must be in (0, 10]',
        ]);
      }
    }
  });
});
