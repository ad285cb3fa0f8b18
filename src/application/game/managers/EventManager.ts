// Application layer: Event manager
// Wraps EventEmitter to publish session events

import { EventEmitter } from 'events';
import type { SessionEvent } from '@/domain/game/session.js';
import { eventLogger } from '@/utils/logger.js';

export type SessionEventType = SessionEvent['type'];
export type SessionEventOf<T extends SessionEventType> = Extract<SessionEvent, { type: T }>;
export type SessionEventHandler<E extends SessionEvent = SessionEvent> = (event: E) => void;

const GAME_EVENT = 'game-event';

/**
 * Listener failures are logged and never reach the session that emitted.
 */
export class EventManager {
  private emitter = new EventEmitter();
  private wrapped = new Map<SessionEventHandler, SessionEventHandler>();

  onGameEvent(handler: SessionEventHandler): void {
    if (this.wrapped.has(handler)) {
      return;
    }
    const guarded: SessionEventHandler = (event) => {
      try {
        handler(event);
      } catch (error) {
        eventLogger.forSession(event.sessionId).error('Session event listener failed', {
          eventType: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };
    this.wrapped.set(handler, guarded);
    this.emitter.on(GAME_EVENT, guarded);
  }

  offGameEvent(handler: SessionEventHandler): void {
    const guarded = this.wrapped.get(handler);
    if (!guarded) {
      return;
    }
    this.emitter.off(GAME_EVENT, guarded);
    this.wrapped.delete(handler);
  }

  /**
   * Subscribe to one event type. Returns the unsubscribe function.
   */
  on<T extends SessionEventType>(type: T, handler: SessionEventHandler<SessionEventOf<T>>): () => void {
    const filtered: SessionEventHandler = (event) => {
      if (isEventOf(event, type)) {
        handler(event);
      }
    };
    this.onGameEvent(filtered);
    return () => this.offGameEvent(filtered);
  }

  emitGameEvent(event: SessionEvent): void {
    this.emitter.emit(GAME_EVENT, event);
  }

  listenerCount(): number {
    return this.wrapped.size;
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners(GAME_EVENT);
    this.wrapped.clear();
  }
}

function isEventOf<T extends SessionEventType>(event: SessionEvent, type: T): event is SessionEventOf<T> {
  return event.type === type;
}
