// Domain layer: Difficulty presets and validation

import type { DifficultyId, DifficultySettings } from './types.js';
import { InvalidArgumentError } from '@/utils/errors.js';

export const MIN_TALENT = 1;
export const MAX_TALENT = 10;
export const MAX_EXPERIENCE_MULTIPLIER = 100;
export const MAX_RECOVERY_MULTIPLIER = 10;

export const DIFFICULTY_PRESETS: Record<DifficultyId, DifficultySettings> = {
  easy: {
    id: 'easy',
    label: '简单',
    talentRange: { min: 5, max: 10 },
    initialPillCount: 3,
    experienceMultiplier: 1.2,
    recoveryMultiplier: 1.3,
  },
  normal: {
    id: 'normal',
    label: '普通',
    talentRange: { min: 1, max: 10 },
    initialPillCount: 1,
    experienceMultiplier: 1.0,
    recoveryMultiplier: 1.0,
  },
  hard: {
    id: 'hard',
    label: '困难',
    talentRange: { min: 1, max: 6 },
    initialPillCount: 0,
    experienceMultiplier: 0.8,
    recoveryMultiplier: 0.7,
  },
};

export function listDifficultyPresets(): DifficultySettings[] {
  return Object.values(DIFFICULTY_PRESETS).map(cloneDifficulty);
}

/**
 * Find a preset by id ("normal") or label ("普通")
 */
export function findDifficultyPreset(ref: string): DifficultySettings | undefined {
  const needle = ref.trim();
  const preset = Object.values(DIFFICULTY_PRESETS).find(
    (candidate) => candidate.id === needle || candidate.label === needle
  );
  return preset ? cloneDifficulty(preset) : undefined;
}

export function resolveDifficulty(ref: string | DifficultySettings): DifficultySettings {
  if (typeof ref !== 'string') {
    return validateDifficulty(ref);
  }

  const preset = findDifficultyPreset(ref);
  if (!preset) {
    throw new InvalidArgumentError(`未知难度: ${ref}`, {
      difficulty: ref,
      known: Object.keys(DIFFICULTY_PRESETS),
    });
  }
  return preset;
}

/**
 * Reject malformed settings before they reach gameplay.
 * Returns a frozen copy on success.
 */
export function validateDifficulty(settings: DifficultySettings): DifficultySettings {
  const problems: string[] = [];
  const { talentRange } = settings;

  if (!Number.isInteger(talentRange.min) || !Number.isInteger(talentRange.max)) {
    problems.push('talentRange bounds must be integers');
  } else {
    if (talentRange.min > talentRange.max) {
      problems.push(`talentRange is empty (${talentRange.min} > ${talentRange.max})`);
    }
    if (talentRange.min < MIN_TALENT || talentRange.max > MAX_TALENT) {
      problems.push(`talentRange must lie within ${MIN_TALENT}-${MAX_TALENT}`);
    }
  }

  if (!Number.isInteger(settings.initialPillCount) || settings.initialPillCount < 0) {
    problems.push('initialPillCount must be a non-negative integer');
  }

  if (
    !Number.isFinite(settings.experienceMultiplier) ||
    settings.experienceMultiplier <= 0 ||
    settings.experienceMultiplier > MAX_EXPERIENCE_MULTIPLIER
  ) {
    problems.push(`experienceMultiplier must be in (0, ${MAX_EXPERIENCE_MULTIPLIER}]`);
  }

  if (
    !Number.isFinite(settings.recoveryMultiplier) ||
    settings.recoveryMultiplier <= 0 ||
    settings.recoveryMultiplier > MAX_RECOVERY_MULTIPLIER
  ) {
    problems.push(`recoveryMultiplier must be in (0, ${MAX_RECOVERY_MULTIPLIER}]`);
  }

  if (problems.length > 0) {
    throw new InvalidArgumentError(`难度配置无效: ${problems.join('; ')}`, {
      difficulty: settings.id,
      problems,
    });
  }

  return Object.freeze({
    ...settings,
    talentRange: Object.freeze({ ...talentRange }),
  });
}

export function cloneDifficulty(settings: DifficultySettings): DifficultySettings {
  return { ...settings, talentRange: { ...settings.talentRange } };
}
