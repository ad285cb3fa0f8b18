import { describe, it, expect, beforeEach } from 'vitest';
import { InMemorySessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import { SessionFactory } from '@/infrastructure/session/SessionFactory.js';
import { RandomDiceRoller, SeededDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { SessionLimitError } from '@/utils/errors.js';
import { GAME_COUNTERS, gameMetrics } from '@/utils/metrics.js';
import { TEST_DEFAULTS, customDifficulty, makeDeps } from './helpers.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('InMemorySessionRegistry', () => {
  let registry: InMemorySessionRegistry;

  beforeEach(() => {
    gameMetrics.reset();
    registry = new InMemorySessionRegistry({ maxActiveSessions: 2 }, () => makeDeps());
  });

  it('creates sessions under uuid v4 ids', () => {
    const session = registry.create('normal', { talent: 5 });

    expect(session.id).toMatch(UUID_V4);
    expect(registry.get(session.id)).toBe(session);
    expect(registry.list()).toEqual([session.id]);
    expect(registry.size).toBe(1);
  });

  it('keeps sessions independent', () => {
    const first = registry.create('normal', { talent: 5 });
    const second = registry.create('normal', { talent: 5 });
    first.applyAction('cultivate');

    expect(first.snapshot().character.totalExperience).toBe(19);
    expect(second.snapshot().character.totalExperience).toBe(0);
  });

  it('refuses sessions beyond the limit', () => {
    registry.create('normal', { talent: 5 });
    registry.create('normal', { talent: 5 });

    expect(() => registry.create('normal', { talent: 5 })).toThrow(SessionLimitError);
    expect(gameMetrics.count(GAME_COUNTERS.SESSION_REJECTED_LIMIT)).toBe(1);
  });

  it('deletes sessions', () => {
    const session = registry.create('normal', { talent: 5 });

    expect(registry.delete(session.id)).toBe(true);
    expect(registry.get(session.id)).toBeUndefined();
    expect(registry.delete(session.id)).toBe(false);
    expect(gameMetrics.activeSessions).toBe(0);
  });

  it('counts what sessions publish', () => {
    const session = registry.create('hard', { talent: 2 });
    session.applyAction('meditate');
    session.applyAction('consume_pill');
    session.restart();

    expect(gameMetrics.count(GAME_COUNTERS.SESSION_CREATED)).toBe(1);
    expect(gameMetrics.count(GAME_COUNTERS.ACTION_EXECUTED)).toBe(1);
    expect(gameMetrics.actionCount('meditate')).toBe(1);
    expect(gameMetrics.count(GAME_COUNTERS.ACTION_REJECTED)).toBe(1);
    expect(gameMetrics.count(GAME_COUNTERS.SESSION_RESTARTED)).toBe(1);
  });

  it('evicts the oldest finished session when full', () => {
    const active = registry.create('normal', { talent: 5 });
    const finished = registry.create(customDifficulty({ experienceMultiplier: 100 }), { talent: 10 });
    finished.applyAction('cultivate');
    finished.applyAction('cultivate');
    expect(finished.phase).toBe('ascended');

    const next = registry.create('normal', { talent: 5 });

    expect(registry.list()).toEqual([active.id, next.id]);
    expect(registry.get(finished.id)).toBeUndefined();
    expect(gameMetrics.count(GAME_COUNTERS.SESSION_EVICTED)).toBe(1);
    expect(gameMetrics.activeSessions).toBe(2);
  });

  it('keeps active sessions when full', () => {
    const first = registry.create('normal', { talent: 5 });
    registry.create('normal', { talent: 5 });

    expect(() => registry.create('normal', { talent: 5 })).toThrow(SessionLimitError);
    expect(registry.get(first.id)).toBe(first);
    expect(gameMetrics.count(GAME_COUNTERS.SESSION_EVICTED)).toBe(0);
  });
});

describe('SessionFactory', () => {
  it('seeds the dice when a seed is configured', () => {
    expect(SessionFactory.createDiceRoller({ ...TEST_DEFAULTS, seed: 7 })).toBeInstanceOf(SeededDiceRoller);
    expect(SessionFactory.createDiceRoller(TEST_DEFAULTS)).toBeInstanceOf(RandomDiceRoller);
  });

  it('gives each session its own event bus with achievements attached', () => {
    const first = SessionFactory.createDependencies(TEST_DEFAULTS);
    const second = SessionFactory.createDependencies(TEST_DEFAULTS);

    expect(first.events).not.toBe(second.events);
    expect(first.events.listenerCount()).toBe(1);
  });
});
