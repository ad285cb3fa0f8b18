// Domain layer: Cultivation rule engine
// Pure functions over plain data - same inputs always give the same outputs

import type { RuleEngine } from '@/domain/game/types.js';
import type {
  CharacterStatus,
  DifficultySettings,
  ResourceDelta,
  StageLevel,
} from './types.js';
import { MAX_TALENT, MIN_TALENT } from './difficulty.js';
import { STAGES, TERMINAL_STAGE_ORDINAL } from './stages.js';
import { InvalidArgumentError, OutOfRangeError } from '@/utils/errors.js';

export const MEDITATION_RULES = {
  baseHpRecovery: 2,
  hpPerTalent: 1,
  baseMpRecovery: 8,
  mpPerTalent: 2,
} as const;

export const CULTIVATION_RULES = {
  baseExperience: 12,
  experiencePerTalent: 1.5,
  manaCost: 20,
  streakBonusPerMeditation: 0.1,
  streakBonusCap: 5,
} as const;

export const PILL_RULES = {
  hpRecovery: 30,
  mpRecovery: 30,
} as const;

// Absorbs binary rounding (0.7 * 30 = 20.999...) before truncation
const FLOAT_GUARD = 1e-9;

export function floorAmount(value: number): number {
  return Math.floor(value + FLOAT_GUARD);
}

function assertTalent(talent: number): void {
  if (!Number.isInteger(talent) || talent < MIN_TALENT || talent > MAX_TALENT) {
    throw new InvalidArgumentError(`资质必须是 ${MIN_TALENT}-${MAX_TALENT} 之间的整数`, { talent });
  }
}

// ========== Resource effects ==========

/**
 * Restoration from one meditation. Strictly increasing in talent.
 */
export function meditationEffect(talent: number, difficulty: DifficultySettings): ResourceDelta {
  assertTalent(talent);
  const recovery = difficulty.recoveryMultiplier;

  return {
    hpDelta: floorAmount(MEDITATION_RULES.baseHpRecovery * recovery) + talent * MEDITATION_RULES.hpPerTalent,
    mpDelta: floorAmount(MEDITATION_RULES.baseMpRecovery * recovery) + talent * MEDITATION_RULES.mpPerTalent,
  };
}

/**
 * Experience from one cultivation.
 * A preceding meditation streak adds 10% per meditation, capped at +50%.
 */
export function cultivationGain(
  talent: number,
  difficulty: DifficultySettings,
  streak: number
): number {
  assertTalent(talent);
  if (!Number.isInteger(streak) || streak < 0) {
    throw new InvalidArgumentError('连续打坐次数必须是非负整数', { streak });
  }

  const base = CULTIVATION_RULES.baseExperience + talent * CULTIVATION_RULES.experiencePerTalent;
  const streakFactor =
    1 + Math.min(streak, CULTIVATION_RULES.streakBonusCap) * CULTIVATION_RULES.streakBonusPerMeditation;

  return floorAmount(base * difficulty.experienceMultiplier * streakFactor);
}

export function cultivationCost(_difficulty: DifficultySettings): number {
  return CULTIVATION_RULES.manaCost;
}

/**
 * Fixed restoration per pill, independent of talent
 */
export function pillEffect(difficulty: DifficultySettings): ResourceDelta {
  const recovery = difficulty.recoveryMultiplier;
  return {
    hpDelta: floorAmount(PILL_RULES.hpRecovery * recovery),
    mpDelta: floorAmount(PILL_RULES.mpRecovery * recovery),
  };
}

// ========== Stages ==========

export function stageAt(ordinal: number): StageLevel {
  if (!Number.isInteger(ordinal) || ordinal < 0 || ordinal > TERMINAL_STAGE_ORDINAL) {
    throw new OutOfRangeError(`境界序号超出范围: ${ordinal}`, {
      ordinal,
      terminal: TERMINAL_STAGE_ORDINAL,
    });
  }
  return STAGES[ordinal];
}

export function stageThreshold(ordinal: number): number {
  return stageAt(ordinal).threshold;
}

/**
 * Experience needed to leave the given tier. The terminal tier has none.
 */
export function nextStageThreshold(ordinal: number): number {
  const stage = stageAt(ordinal);
  if (stage.terminal) {
    throw new OutOfRangeError(`${stage.name}已是最高境界`, { ordinal });
  }
  return STAGES[ordinal + 1].threshold;
}

/**
 * Highest tier whose threshold does not exceed the total
 */
export function resolveStage(totalExperience: number): StageLevel {
  if (!Number.isFinite(totalExperience) || totalExperience < 0) {
    throw new InvalidArgumentError('经验值不能为负', { totalExperience });
  }

  for (let i = STAGES.length - 1; i >= 0; i--) {
    if (STAGES[i].threshold <= totalExperience) {
      return STAGES[i];
    }
  }
  return STAGES[0];
}

/**
 * Every tier entered when experience moves from `before` to `after`, ascending
 */
export function stagesCrossed(before: number, after: number): StageLevel[] {
  const from = resolveStage(before).ordinal;
  const to = resolveStage(after).ordinal;
  return STAGES.slice(from + 1, to + 1);
}

// ========== Derived figures ==========

export function powerLevel(status: CharacterStatus): number {
  if (!status.alive) {
    return 0;
  }

  const base =
    status.hp.current * 0.3 +
    status.mp.current * 0.3 +
    status.totalExperience * 0.2 +
    status.talent * 10 +
    status.pillCount * 5;

  return floorAmount(base * status.stage.powerMultiplier);
}

export function recommendAction(status: CharacterStatus): string {
  if (!status.alive) {
    return '修炼失败，请重新开始';
  }
  if (status.stage.terminal) {
    return '已证大道，飞升成仙';
  }

  const hpRatio = status.hp.current / status.hp.max;
  const mpRatio = status.mp.current / status.mp.max;
  const pills = status.pillCount;

  if (hpRatio < 0.3) {
    return pills > 0 ? '生命垂危，建议立即服用丹药' : '生命垂危且无丹药，建议打坐调息';
  }
  if (mpRatio < 0.3) {
    return pills > 0 ? '仙力不足，建议服用丹药恢复' : '仙力不足，建议打坐恢复';
  }
  if (mpRatio > 0.8 && pills > 2) {
    return '状态良好，建议全力修炼';
  }
  if (pills === 0) {
    return '缺少丹药，建议多打坐积累';
  }
  return '状态适中，可以根据需要选择修炼或恢复';
}

/**
 * Default rule set
 */
export const standardRules: RuleEngine = {
  meditationEffect,
  cultivationGain,
  cultivationCost,
  pillEffect,
  stageAt,
  stageThreshold,
  nextStageThreshold,
  resolveStage,
};
