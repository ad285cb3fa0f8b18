// Application layer: Game session coordinator
// Owns one play-through: phase machine, action dispatch, log and events

import { v4 as uuidv4 } from 'uuid';
import type { SessionState } from '@/domain/game/GameState.js';
import type { RuleEngine } from '@/domain/game/types.js';
import type {
  ActionOutcome,
  ActionPreview,
  ActionResult,
  LogEntry,
  SessionEvent,
  SessionPhase,
  SessionStatistics,
  StatusView,
} from '@/domain/game/session.js';
import type { ActionKind, DifficultySettings, StageLevel } from '@/domain/cultivation/types.js';
import { ACTION_KINDS } from '@/domain/cultivation/types.js';
import { cloneDifficulty, resolveDifficulty } from '@/domain/cultivation/difficulty.js';
import { powerLevel, recommendAction } from '@/domain/cultivation/rules.js';
import { Character } from '@/infrastructure/character/Character.js';
import { EventLog } from '@/infrastructure/session/EventLog.js';
import { rollInRange, type DiceRoller } from '@/infrastructure/game/DiceRoller.js';
import type { GameDefaults } from '@/utils/config.js';
import { InvalidArgumentError, isCultivationError, type CultivationError } from '@/utils/errors.js';
import {
  actionLabel,
  applyAction as executeAction,
  previewAction as planPreview,
  validateAction,
} from './actions.js';
import type { EventManager } from './managers/EventManager.js';
import type { AchievementTracker, UnlockedAchievement } from './managers/AchievementTracker.js';

export interface GameSessionDependencies {
  rules: RuleEngine;
  diceRoller: DiceRoller;
  events: EventManager;
  defaults: GameDefaults;
  achievements?: AchievementTracker;
  clock?: () => number;
}

export interface CreateSessionOptions {
  id?: string;
  talent?: number;
  characterName?: string;
}

export type RestartOptions = Omit<CreateSessionOptions, 'id'>;

interface SessionCounters {
  actionCounts: Record<ActionKind, number>;
  rejectedActions: number;
  pillsConsumed: number;
  longestMeditationStreak: number;
}

function emptyCounters(): SessionCounters {
  return {
    actionCounts: { meditate: 0, consume_pill: 0, cultivate: 0, wait: 0 },
    rejectedActions: 0,
    pillsConsumed: 0,
    longestMeditationStreak: 0,
  };
}

export const SESSION_MESSAGES = {
  welcome: (name: string) => `欢迎来到极简修仙世界，${name}！`,
  journey: (difficulty: string, talent: number, pills: number) =>
    `难度：${difficulty}，资质 ${talent}，丹药 ${pills} 颗，开始你的修仙之旅。`,
  breakthrough: (stage: StageLevel) => `突破至 ${stage.name}！`,
  death: '修炼失败，游戏结束。',
  ascension: '恭喜！你已成功飞升，达成完美结局！',
  rejection: (label: string, reason: string) => `无法执行${label}：${reason}`,
} as const;

/**
 * GameSession - the state manager for one cultivator.
 * All mutation goes through applyAction; reads go through snapshot().
 */
export class GameSession {
  private state: SessionState;
  private counters: SessionCounters = emptyCounters();

  constructor(
    private readonly deps: GameSessionDependencies,
    difficulty: string | DifficultySettings,
    options: CreateSessionOptions = {}
  ) {
    const { id, ...rest } = options;
    this.state = this.createState(id ?? uuidv4(), 1, resolveDifficulty(difficulty), rest);
    this.publishStart();
  }

  get id(): string {
    return this.state.id;
  }

  get phase(): SessionPhase {
    return this.state.phase;
  }

  get generation(): number {
    return this.state.generation;
  }

  get difficulty(): DifficultySettings {
    return cloneDifficulty(this.state.difficulty);
  }

  // ========== Actions ==========

  applyAction(kind: ActionKind): ActionResult {
    const { rules } = this.deps;
    const error = validateAction(kind, this.state, rules);
    if (error) {
      return this.reject(kind, error);
    }

    let outcome: ActionOutcome;
    try {
      outcome = executeAction(kind, this.state, rules);
    } catch (err) {
      // planning runs before any mutation, so the state is unchanged here
      if (isCultivationError(err)) {
        return this.reject(kind, err);
      }
      throw err;
    }
    const { log, character } = this.state;

    log.append('action', outcome.message, {
      kind,
      hp: outcome.hpApplied,
      mp: outcome.mpApplied,
      experience: outcome.experienceGained,
      pills: outcome.pillsConsumed,
    });
    this.track(kind, outcome.pillsConsumed);

    this.emit({
      type: 'action_executed',
      sessionId: this.state.id,
      outcome,
      status: character.toStatus(),
    });

    const messages = [outcome.message];
    for (const stage of outcome.breakthroughs) {
      const message = SESSION_MESSAGES.breakthrough(stage);
      log.append('breakthrough', message, { stage: stage.key, ordinal: stage.ordinal });
      messages.push(message);
      this.emit({
        type: 'breakthrough',
        sessionId: this.state.id,
        stage: { ...stage },
        totalExperience: character.experience.total,
      });
    }

    const phaseMessage = this.evaluatePhase();
    if (phaseMessage) {
      messages.push(phaseMessage);
    }

    return {
      success: true,
      kind,
      message: messages.join(' '),
      outcome,
      breakthroughs: outcome.breakthroughs.map((stage) => ({ ...stage })),
      phase: this.state.phase,
      snapshot: this.snapshot(),
    };
  }

  previewAction(kind: ActionKind): ActionPreview {
    return planPreview(kind, this.state, this.deps.rules);
  }

  availableActions(): ActionKind[] {
    if (this.state.phase !== 'active') {
      return [];
    }
    return ACTION_KINDS.filter((kind) => validateAction(kind, this.state, this.deps.rules) === null);
  }

  // ========== Views ==========

  snapshot(): StatusView {
    const status = this.state.character.toStatus();
    return {
      sessionId: this.state.id,
      generation: this.state.generation,
      phase: this.state.phase,
      difficulty: cloneDifficulty(this.state.difficulty),
      character: status,
      powerLevel: powerLevel(status),
      recommendation: recommendAction(status),
      availableActions: this.availableActions(),
      recentLog: this.state.log.recent(this.deps.defaults.recentLogCount),
    };
  }

  logEntries(limit?: number): LogEntry[] {
    return limit === undefined ? this.state.log.entries() : this.state.log.recent(limit);
  }

  statistics(): SessionStatistics {
    const status = this.state.character.toStatus();
    return {
      sessionId: this.state.id,
      generation: this.state.generation,
      phase: this.state.phase,
      difficulty: this.state.difficulty.id,
      totalActions: status.totalActions,
      actionCounts: { ...this.counters.actionCounts },
      rejectedActions: this.counters.rejectedActions,
      pillsConsumed: this.counters.pillsConsumed,
      longestMeditationStreak: this.counters.longestMeditationStreak,
      totalExperience: status.totalExperience,
      stage: status.stage.name,
      powerLevel: powerLevel(status),
    };
  }

  achievements(): UnlockedAchievement[] {
    return this.deps.achievements?.list() ?? [];
  }

  // ========== Lifecycle ==========

  /**
   * Discard the play-through and begin a new one under the same id.
   * Keeps the previous difficulty and name unless overridden.
   */
  restart(difficulty?: string | DifficultySettings, options: RestartOptions = {}): GameSession {
    const settings = difficulty === undefined ? this.state.difficulty : resolveDifficulty(difficulty);
    const next = this.createState(this.state.id, this.state.generation + 1, settings, {
      characterName: options.characterName ?? this.state.character.name,
      talent: options.talent,
    });

    this.state = next;
    this.counters = emptyCounters();
    this.emit({
      type: 'restart',
      sessionId: next.id,
      generation: next.generation,
      difficulty: next.difficulty.id,
    });
    this.publishStart();
    return this;
  }

  // ========== Internals ==========

  private createState(
    id: string,
    generation: number,
    difficulty: DifficultySettings,
    options: RestartOptions
  ): SessionState {
    const { defaults, diceRoller, rules } = this.deps;
    const clock = this.deps.clock ?? Date.now;
    const talent = this.resolveTalent(difficulty, options.talent, diceRoller);

    const character = new Character(
      {
        name: options.characterName ?? defaults.characterName,
        talent,
        maxHp: defaults.maxHp,
        maxMp: defaults.maxMp,
        initialMp: Math.floor(defaults.maxMp * defaults.initialMpRatio),
        pillCount: difficulty.initialPillCount,
      },
      rules
    );

    const log = new EventLog(clock);
    log.append('system', SESSION_MESSAGES.welcome(character.name));
    log.append(
      'system',
      SESSION_MESSAGES.journey(difficulty.label, talent, difficulty.initialPillCount),
      { difficulty: difficulty.id, talent }
    );

    return {
      id,
      generation,
      phase: 'active',
      difficulty: cloneDifficulty(difficulty),
      character,
      log,
      createdAt: clock(),
    };
  }

  private resolveTalent(
    difficulty: DifficultySettings,
    explicit: number | undefined,
    roller: DiceRoller
  ): number {
    const { min, max } = difficulty.talentRange;
    const talent = explicit ?? rollInRange(roller, difficulty.talentRange);
    if (!Number.isInteger(talent) || talent < min || talent > max) {
      throw new InvalidArgumentError(`资质 ${talent} 不在难度范围 ${min}-${max} 内`, {
        talent,
        min,
        max,
        rolled: explicit === undefined,
      });
    }
    return talent;
  }

  private reject(kind: ActionKind, error: CultivationError): ActionResult {
    this.state.log.append('rejection', SESSION_MESSAGES.rejection(actionLabel(kind), error.message), {
      kind,
      code: error.code,
    });
    this.counters.rejectedActions++;

    const failure = { code: error.code, message: error.message };
    this.emit({ type: 'action_rejected', sessionId: this.state.id, kind, error: failure });

    return {
      success: false,
      kind,
      message: error.message,
      error: failure,
      breakthroughs: [],
      phase: this.state.phase,
      snapshot: this.snapshot(),
    };
  }

  private track(kind: ActionKind, pills: number): void {
    this.counters.actionCounts[kind]++;
    this.counters.pillsConsumed += pills;
    this.counters.longestMeditationStreak = Math.max(
      this.counters.longestMeditationStreak,
      this.state.character.meditationStreak
    );
  }

  /**
   * Death is checked before ascension. Returns the phase message, if any.
   */
  private evaluatePhase(): string | null {
    const { character, log } = this.state;
    if (this.state.phase !== 'active') {
      return null;
    }

    if (!character.isAlive()) {
      this.state.phase = 'game_over';
      log.append('phase', SESSION_MESSAGES.death, { phase: 'game_over' });
      this.emit({
        type: 'game_over',
        sessionId: this.state.id,
        phase: 'game_over',
        reason: 'character_died',
        status: character.toStatus(),
      });
      return SESSION_MESSAGES.death;
    }

    if (character.currentStage().terminal) {
      this.state.phase = 'ascended';
      log.append('phase', SESSION_MESSAGES.ascension, { phase: 'ascended' });
      this.emit({
        type: 'game_over',
        sessionId: this.state.id,
        phase: 'ascended',
        reason: 'ascension',
        status: character.toStatus(),
      });
      return SESSION_MESSAGES.ascension;
    }

    return null;
  }

  private publishStart(): void {
    const { character } = this.state;
    this.emit({
      type: 'game_start',
      sessionId: this.state.id,
      generation: this.state.generation,
      characterName: character.name,
      talent: character.talent.value,
      difficulty: this.state.difficulty.id,
    });
  }

  private emit(event: SessionEvent): void {
    this.deps.events.emitGameEvent(event);
  }
}

/**
 * Start a new play-through
 */
export function createSession(
  deps: GameSessionDependencies,
  difficulty: string | DifficultySettings,
  options: CreateSessionOptions = {}
): GameSession {
  return new GameSession(deps, difficulty, options);
}
