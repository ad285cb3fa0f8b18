// Infrastructure: Session registry
// Holds the live sessions of the HTTP adapter; nothing is persisted

import {
  createSession,
  type CreateSessionOptions,
  type GameSession,
  type GameSessionDependencies,
} from '@/application/game/GameSession.js';
import type { EventManager } from '@/application/game/managers/EventManager.js';
import type { DifficultySettings } from '@/domain/cultivation/types.js';
import type { SessionLimits } from '@/utils/config.js';
import { SessionLimitError } from '@/utils/errors.js';
import { sessionLogger } from '@/utils/logger.js';
import { GAME_COUNTERS, gameMetrics } from '@/utils/metrics.js';
import { SessionFactory } from './SessionFactory.js';

export interface ISessionRegistry {
  readonly size: number;
  create(difficulty: string | DifficultySettings, options?: CreateSessionOptions): GameSession;
  get(id: string): GameSession | undefined;
  delete(id: string): boolean;
  list(): string[];
}

interface RegistryEntry {
  session: GameSession;
  events: EventManager;
}

export class InMemorySessionRegistry implements ISessionRegistry {
  private sessions = new Map<string, RegistryEntry>();

  constructor(
    private limits: SessionLimits,
    private createDependencies: () => GameSessionDependencies = () => SessionFactory.createDependencies()
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  /**
   * When full, the oldest finished (dead or ascended) session makes room.
   * Fails only when every held session is still active.
   */
  create(difficulty: string | DifficultySettings, options: CreateSessionOptions = {}): GameSession {
    if (this.sessions.size >= this.limits.maxActiveSessions && !this.evictFinished()) {
      gameMetrics.increment(GAME_COUNTERS.SESSION_REJECTED_LIMIT);
      sessionLogger.warn('Session limit reached', { limit: this.limits.maxActiveSessions });
      throw new SessionLimitError(this.limits.maxActiveSessions);
    }

    const deps = this.createDependencies();
    this.observe(deps.events);
    const session = createSession(deps, difficulty, options);
    this.sessions.set(session.id, { session, events: deps.events });

    gameMetrics.increment(GAME_COUNTERS.SESSION_CREATED);
    gameMetrics.setActiveSessions(this.sessions.size);
    return session;
  }

  get(id: string): GameSession | undefined {
    return this.sessions.get(id)?.session;
  }

  delete(id: string): boolean {
    const entry = this.sessions.get(id);
    if (!entry) {
      return false;
    }

    this.remove(id, entry);
    gameMetrics.increment(GAME_COUNTERS.SESSION_DELETED);
    sessionLogger.forSession(id).info('Session closed');
    return true;
  }

  list(): string[] {
    return Array.from(this.sessions.keys());
  }

  private evictFinished(): boolean {
    for (const [id, entry] of this.sessions) {
      if (entry.session.phase !== 'active') {
        this.remove(id, entry);
        gameMetrics.increment(GAME_COUNTERS.SESSION_EVICTED);
        sessionLogger.forSession(id).info('Finished session evicted', { phase: entry.session.phase });
        return true;
      }
    }
    return false;
  }

  private remove(id: string, entry: RegistryEntry): void {
    entry.events.removeAllListeners();
    this.sessions.delete(id);
    gameMetrics.setActiveSessions(this.sessions.size);
  }

  /**
   * Log and count what the session publishes
   */
  private observe(events: EventManager): void {
    events.onGameEvent((event) => {
      const log = sessionLogger.forSession(event.sessionId);
      switch (event.type) {
        case 'game_start':
          log.info('Session started', {
            generation: event.generation,
            difficulty: event.difficulty,
            talent: event.talent,
          });
          break;
        case 'action_executed':
          gameMetrics.recordAction(event.outcome.kind);
          log.debug('Action executed', {
            kind: event.outcome.kind,
            hp: event.status.hp.current,
            mp: event.status.mp.current,
            experience: event.status.totalExperience,
          });
          break;
        case 'action_rejected':
          gameMetrics.increment(GAME_COUNTERS.ACTION_REJECTED);
          log.debug('Action rejected', { kind: event.kind, code: event.error.code });
          break;
        case 'breakthrough':
          gameMetrics.increment(GAME_COUNTERS.BREAKTHROUGH);
          log.info('Breakthrough', { stage: event.stage.key, totalExperience: event.totalExperience });
          break;
        case 'game_over':
          gameMetrics.increment(
            event.reason === 'ascension' ? GAME_COUNTERS.ASCENSION : GAME_COUNTERS.CHARACTER_DIED
          );
          log.info('Session finished', { phase: event.phase, reason: event.reason });
          break;
        case 'restart':
          gameMetrics.increment(GAME_COUNTERS.SESSION_RESTARTED);
          log.info('Session restarted', { generation: event.generation, difficulty: event.difficulty });
          break;
      }
    });
  }
}
