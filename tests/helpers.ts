// Shared fixtures for the test suites

import { GameSession, type CreateSessionOptions, type GameSessionDependencies } from '@/application/game/GameSession.js';
import type { DifficultySettings } from '@/domain/cultivation/types.js';
import { FixedDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { SessionFactory } from '@/infrastructure/session/SessionFactory.js';
import type { GameDefaults } from '@/utils/config.js';

export const FIXED_NOW = Date.parse('2026-01-01T00:00:00.000Z');

export const TEST_DEFAULTS: GameDefaults = {
  maxHp: 100,
  maxMp: 100,
  initialMpRatio: 0.5,
  recentLogCount: 8,
  defaultDifficulty: 'normal',
  characterName: '测试修士',
};

export function makeDeps(overrides: Partial<GameSessionDependencies> = {}): GameSessionDependencies {
  return SessionFactory.createDependencies(TEST_DEFAULTS, {
    diceRoller: new FixedDiceRoller([5]),
    clock: () => FIXED_NOW,
    ...overrides,
  });
}

export function makeSession(
  difficulty: string | DifficultySettings = 'normal',
  options: CreateSessionOptions = { talent: 5 },
  overrides: Partial<GameSessionDependencies> = {}
): GameSession {
  return new GameSession(makeDeps(overrides), difficulty, options);
}

export function customDifficulty(overrides: Partial<DifficultySettings> = {}): DifficultySettings {
  return {
    id: 'custom',
    label: '自定义',
    talentRange: { min: 1, max: 10 },
    initialPillCount: 1,
    experienceMultiplier: 1,
    recoveryMultiplier: 1,
    ...overrides,
  };
}
