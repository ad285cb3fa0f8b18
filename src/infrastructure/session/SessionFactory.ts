// Infrastructure layer: Session factory for dependency wiring
// Centralizes session dependency creation for the registry and tests

import type { GameSessionDependencies } from '@/application/game/GameSession.js';
import { EventManager } from '@/application/game/managers/EventManager.js';
import { AchievementTracker } from '@/application/game/managers/AchievementTracker.js';
import { standardRules } from '@/domain/cultivation/rules.js';
import { RandomDiceRoller, SeededDiceRoller, type DiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { buildGameDefaults, type GameDefaults } from '@/utils/config.js';

/**
 * Factory for creating session dependencies
 */
export class SessionFactory {
  /**
   * Create all dependencies needed for a GameSession instance.
   * Each call gets its own event bus and achievement tracker.
   */
  static createDependencies(
    defaults: GameDefaults = buildGameDefaults(),
    overrides: Partial<GameSessionDependencies> = {}
  ): GameSessionDependencies {
    const events = overrides.events ?? new EventManager();
    const achievements = overrides.achievements ?? new AchievementTracker(overrides.clock);
    achievements.attach(events);

    return {
      rules: overrides.rules ?? standardRules,
      diceRoller: overrides.diceRoller ?? SessionFactory.createDiceRoller(defaults),
      events,
      achievements,
      defaults: overrides.defaults ?? defaults,
      ...(overrides.clock ? { clock: overrides.clock } : {}),
    };
  }

  /**
   * Seeded when GAME_SEED is configured, for reproducible talent rolls
   */
  static createDiceRoller(defaults: GameDefaults): DiceRoller {
    return defaults.seed !== undefined ? new SeededDiceRoller(defaults.seed) : new RandomDiceRoller();
  }
}
