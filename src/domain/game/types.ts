// Domain layer: Rule engine types
// NO external dependencies - pure TypeScript

import type {
  DifficultySettings,
  ResourceDelta,
  StageLevel,
} from '@/domain/cultivation/types.js';

/**
 * Stage ladder lookups, the part of the rules components depend on
 */
export interface StageTable {
  /** Tier at an ordinal; throws OutOfRangeError beyond the terminal tier */
  stageAt(ordinal: number): StageLevel;

  /** Highest tier whose threshold <= totalExperience */
  resolveStage(totalExperience: number): StageLevel;
}

/**
 * Pluggable rule engine - all numeric effects of the game.
 * Implementations must be stateless and deterministic.
 */
export interface RuleEngine extends StageTable {
  // Resource effects
  meditationEffect(talent: number, difficulty: DifficultySettings): ResourceDelta;
  pillEffect(difficulty: DifficultySettings): ResourceDelta;

  // Progression
  cultivationGain(talent: number, difficulty: DifficultySettings, streak: number): number;
  cultivationCost(difficulty: DifficultySettings): number;

  // Thresholds
  stageThreshold(ordinal: number): number;
  nextStageThreshold(ordinal: number): number;
}
