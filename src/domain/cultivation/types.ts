// Domain layer: Cultivation types
// NO external dependencies - pure TypeScript

// ========== Stages ==========

export type StageKey =
  | 'qi_refining'
  | 'foundation'
  | 'core_formation'
  | 'nascent_soul'
  | 'spirit_transformation'
  | 'ascension';

/**
 * One tier of the progression ladder (境界).
 * Thresholds are cumulative experience totals.
 */
export interface StageLevel {
  readonly ordinal: number;
  readonly key: StageKey;
  readonly name: string;
  readonly threshold: number;
  readonly terminal: boolean;
  readonly powerMultiplier: number;
}

// ========== Difficulty ==========

export type DifficultyId = 'easy' | 'normal' | 'hard';

export interface TalentRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Immutable bundle chosen before a session starts
 */
export interface DifficultySettings {
  readonly id: string;
  readonly label: string;
  readonly talentRange: TalentRange;
  readonly initialPillCount: number;
  readonly experienceMultiplier: number;
  readonly recoveryMultiplier: number;
}

// ========== Actions ==========

export type ActionKind = 'meditate' | 'consume_pill' | 'cultivate' | 'wait';

export const ACTION_KINDS: readonly ActionKind[] = [
  'meditate',
  'consume_pill',
  'cultivate',
  'wait',
];

export interface ActionInfo {
  kind: ActionKind;
  displayName: string;
  description: string;
  sortOrder: number;
}

export interface ResourceDelta {
  hpDelta: number;
  mpDelta: number;
}

// ========== Status ==========

export interface ResourceView {
  current: number;
  max: number;
}

/**
 * Read-only projection of a character. Plain data, safe to hand to renderers.
 */
export interface CharacterStatus {
  name: string;
  hp: ResourceView;
  mp: ResourceView;
  talent: number;
  pillCount: number;
  totalExperience: number;
  stage: StageLevel;
  nextStageThreshold: number | null;
  stageProgress: number;
  meditationStreak: number;
  totalActions: number;
  alive: boolean;
}
