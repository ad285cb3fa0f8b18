// Utility: Game metrics
// In-process counters behind GET /api/metrics; reset on restart of the process

import type { ActionKind } from '@/domain/cultivation/types.js';

export const GAME_COUNTERS = {
  SESSION_CREATED: 'session.created',
  SESSION_DELETED: 'session.deleted',
  SESSION_EVICTED: 'session.evicted',
  SESSION_RESTARTED: 'session.restarted',
  SESSION_REJECTED_LIMIT: 'session.rejected_limit',

  ACTION_EXECUTED: 'action.executed',
  ACTION_REJECTED: 'action.rejected',
  BREAKTHROUGH: 'cultivation.breakthrough',
  CHARACTER_DIED: 'cultivation.character_died',
  ASCENSION: 'cultivation.ascension',
} as const;

export type GameCounter = (typeof GAME_COUNTERS)[keyof typeof GAME_COUNTERS];

export interface MetricsSnapshot {
  activeSessions: number;
  counters: Record<GameCounter, number>;
  actions: Record<ActionKind, number>;
}

function zeroCounters(): Record<GameCounter, number> {
  return {
    'session.created': 0,
    'session.deleted': 0,
    'session.evicted': 0,
    'session.restarted': 0,
    'session.rejected_limit': 0,
    'action.executed': 0,
    'action.rejected': 0,
    'cultivation.breakthrough': 0,
    'cultivation.character_died': 0,
    'cultivation.ascension': 0,
  };
}

function zeroActions(): Record<ActionKind, number> {
  return { meditate: 0, consume_pill: 0, cultivate: 0, wait: 0 };
}

export class GameMetrics {
  private counters = zeroCounters();
  private actions = zeroActions();
  private active = 0;

  increment(counter: GameCounter, by = 1): void {
    this.counters[counter] += by;
  }

  /** Counts the action overall and under its kind */
  recordAction(kind: ActionKind): void {
    this.counters['action.executed']++;
    this.actions[kind]++;
  }

  setActiveSessions(count: number): void {
    this.active = count;
  }

  count(counter: GameCounter): number {
    return this.counters[counter];
  }

  actionCount(kind: ActionKind): number {
    return this.actions[kind];
  }

  get activeSessions(): number {
    return this.active;
  }

  snapshot(): MetricsSnapshot {
    return {
      activeSessions: this.active,
      counters: { ...this.counters },
      actions: { ...this.actions },
    };
  }

  reset(): void {
    this.counters = zeroCounters();
    this.actions = zeroActions();
    this.active = 0;
  }
}

export const gameMetrics = new GameMetrics();
