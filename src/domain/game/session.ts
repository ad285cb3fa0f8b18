// Domain layer: Game session types and interfaces
// NO external dependencies - pure TypeScript

import type {
  ActionKind,
  CharacterStatus,
  DifficultySettings,
  StageLevel,
} from '@/domain/cultivation/types.js';
import type { CultivationErrorCode } from '@/utils/errors.js';

/**
 * Life cycle: active -> game_over | ascended. Both ends are terminal.
 */
export type SessionPhase = 'active' | 'game_over' | 'ascended';

// ========== Event log ==========

export type LogEntryKind = 'system' | 'action' | 'breakthrough' | 'rejection' | 'phase';

export interface LogEntry {
  sequence: number;
  timestamp: string;
  kind: LogEntryKind;
  message: string;
  payload?: Record<string, unknown>;
}

/**
 * Append-only, session-scoped record
 */
export interface IEventLog {
  readonly size: number;
  append(kind: LogEntryKind, message: string, payload?: Record<string, unknown>): LogEntry;
  entries(): LogEntry[];
  recent(count: number): LogEntry[];
}

// ========== Action results ==========

export interface ActionOutcome {
  kind: ActionKind;
  hpApplied: number;
  mpApplied: number;
  experienceGained: number;
  pillsConsumed: number;
  breakthroughs: StageLevel[];
  message: string;
}

export interface ActionFailure {
  code: CultivationErrorCode;
  message: string;
}

export interface ActionResult {
  success: boolean;
  kind: ActionKind;
  message: string;
  outcome?: ActionOutcome;
  error?: ActionFailure;
  breakthroughs: StageLevel[];
  phase: SessionPhase;
  snapshot: StatusView;
}

export interface ActionPreview {
  kind: ActionKind;
  allowed: boolean;
  error?: ActionFailure;
  hpDelta: number;
  mpDelta: number;
  experienceDelta: number;
  pillDelta: number;
  breakthroughs: StageLevel[];
}

// ========== Views ==========

/**
 * The only data renderers may read. Always a fresh copy.
 */
export interface StatusView {
  sessionId: string;
  generation: number;
  phase: SessionPhase;
  difficulty: DifficultySettings;
  character: CharacterStatus;
  powerLevel: number;
  recommendation: string;
  availableActions: ActionKind[];
  recentLog: LogEntry[];
}

export interface SessionStatistics {
  sessionId: string;
  generation: number;
  phase: SessionPhase;
  difficulty: string;
  totalActions: number;
  actionCounts: Record<ActionKind, number>;
  rejectedActions: number;
  pillsConsumed: number;
  longestMeditationStreak: number;
  totalExperience: number;
  stage: string;
  powerLevel: number;
}

// ========== Session events ==========

/**
 * Events published by a session to its listeners
 */
export type SessionEvent =
  | GameStartEvent
  | ActionExecutedEvent
  | ActionRejectedEvent
  | BreakthroughEvent
  | GameOverEvent
  | RestartEvent;

export interface GameStartEvent {
  type: 'game_start';
  sessionId: string;
  generation: number;
  characterName: string;
  talent: number;
  difficulty: string;
}

export interface ActionExecutedEvent {
  type: 'action_executed';
  sessionId: string;
  outcome: ActionOutcome;
  status: CharacterStatus;
}

export interface ActionRejectedEvent {
  type: 'action_rejected';
  sessionId: string;
  kind: ActionKind;
  error: ActionFailure;
}

export interface BreakthroughEvent {
  type: 'breakthrough';
  sessionId: string;
  stage: StageLevel;
  totalExperience: number;
}

export interface GameOverEvent {
  type: 'game_over';
  sessionId: string;
  phase: Exclude<SessionPhase, 'active'>;
  reason: 'character_died' | 'ascension';
  status: CharacterStatus;
}

export interface RestartEvent {
  type: 'restart';
  sessionId: string;
  generation: number;
  difficulty: string;
}
