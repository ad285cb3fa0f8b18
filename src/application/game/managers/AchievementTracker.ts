// Application layer: Achievement tracker
// Listens to session events and unlocks milestones; survives restarts

import type { SessionEvent } from '@/domain/game/session.js';
import type { EventManager } from './EventManager.js';

export type AchievementId =
  | 'first_action'
  | 'first_breakthrough'
  | 'meditation_beginner'
  | 'meditation_master'
  | 'persistent_cultivator'
  | 'cultivation_enthusiast'
  | 'first_death'
  | 'ascended';

export interface AchievementDefinition {
  id: AchievementId;
  title: string;
  description: string;
}

export interface UnlockedAchievement extends AchievementDefinition {
  unlockedAt: string;
}

export const ACHIEVEMENTS: Readonly<Record<AchievementId, AchievementDefinition>> = {
  first_action: { id: 'first_action', title: '初入仙途', description: '完成第一次行动' },
  first_breakthrough: { id: 'first_breakthrough', title: '初窥门径', description: '第一次突破境界' },
  meditation_beginner: { id: 'meditation_beginner', title: '静心入定', description: '连续打坐5次' },
  meditation_master: { id: 'meditation_master', title: '打坐大师', description: '连续打坐10次' },
  persistent_cultivator: { id: 'persistent_cultivator', title: '持之以恒', description: '累计行动10次' },
  cultivation_enthusiast: { id: 'cultivation_enthusiast', title: '勤修不辍', description: '累计修炼5次' },
  first_death: { id: 'first_death', title: '身死道消', description: '第一次修炼失败' },
  ascended: { id: 'ascended', title: '羽化飞升', description: '成功飞升' },
};

const STREAK_MILESTONES: ReadonlyArray<[number, AchievementId]> = [
  [5, 'meditation_beginner'],
  [10, 'meditation_master'],
];

const ACTION_MILESTONE = 10;
const CULTIVATION_MILESTONE = 5;

export class AchievementTracker {
  private unlocked = new Map<AchievementId, UnlockedAchievement>();
  private cultivations = 0;

  constructor(private clock: () => number = Date.now) {}

  /**
   * Subscribe to a session's events. Returns the detach function.
   */
  attach(events: EventManager): () => void {
    const handler = (event: SessionEvent): void => {
      this.handle(event);
    };
    events.onGameEvent(handler);
    return () => events.offGameEvent(handler);
  }

  /**
   * Returns the ids unlocked by this event
   */
  handle(event: SessionEvent): AchievementId[] {
    const candidates: AchievementId[] = [];

    switch (event.type) {
      case 'action_executed': {
        const { status, outcome } = event;
        candidates.push('first_action');
        if (outcome.kind === 'cultivate') {
          this.cultivations++;
          if (this.cultivations >= CULTIVATION_MILESTONE) candidates.push('cultivation_enthusiast');
        }
        if (status.totalActions >= ACTION_MILESTONE) candidates.push('persistent_cultivator');
        for (const [streak, id] of STREAK_MILESTONES) {
          if (status.meditationStreak >= streak) candidates.push(id);
        }
        break;
      }
      case 'breakthrough':
        candidates.push('first_breakthrough');
        break;
      case 'game_over':
        candidates.push(event.reason === 'character_died' ? 'first_death' : 'ascended');
        break;
      case 'game_start':
      case 'action_rejected':
      case 'restart':
        break;
    }

    return candidates.filter((id) => this.unlock(id));
  }

  has(id: AchievementId): boolean {
    return this.unlocked.has(id);
  }

  list(): UnlockedAchievement[] {
    return Array.from(this.unlocked.values(), (entry) => ({ ...entry }));
  }

  private unlock(id: AchievementId): boolean {
    if (this.unlocked.has(id)) {
      return false;
    }
    this.unlocked.set(id, {
      ...ACHIEVEMENTS[id],
      unlockedAt: new Date(this.clock()).toISOString(),
    });
    return true;
  }
}
