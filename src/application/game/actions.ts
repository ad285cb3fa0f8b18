// Application layer: Action system
// Closed set of player actions, each a validate + plan pair

import type { SessionState } from '@/domain/game/GameState.js';
import type { RuleEngine } from '@/domain/game/types.js';
import type { ActionOutcome, ActionPreview, SessionPhase } from '@/domain/game/session.js';
import { ACTION_CATALOG } from '@/domain/cultivation/stages.js';
import { ACTION_KINDS, type ActionKind } from '@/domain/cultivation/types.js';
import {
  InsufficientResourceError,
  InvalidArgumentError,
  InvalidPhaseError,
} from '@/utils/errors.js';

export type ActionError = InsufficientResourceError | InvalidPhaseError;

/**
 * Requested effects, before clamping
 */
export interface ActionPlan {
  hpDelta: number;
  mpDelta: number;
  experienceDelta: number;
  pillCost: number;
}

interface AppliedEffects {
  hp: number;
  mp: number;
  experience: number;
  pills: number;
}

interface ActionHandler {
  validate(state: SessionState, rules: RuleEngine): ActionError | null;
  plan(state: SessionState, rules: RuleEngine): ActionPlan;
  describe(applied: AppliedEffects, state: SessionState): string;
}

const NO_EFFECT: ActionPlan = { hpDelta: 0, mpDelta: 0, experienceDelta: 0, pillCost: 0 };

const PHASE_LABELS: Record<SessionPhase, string> = {
  active: '修炼中',
  game_over: '已陨落',
  ascended: '已飞升',
};

// ========== Handlers ==========

const meditate: ActionHandler = {
  validate: () => null,
  plan(state, rules) {
    const { character, difficulty } = state;
    const effect = rules.meditationEffect(character.talent.value, difficulty);
    return { ...NO_EFFECT, hpDelta: effect.hpDelta, mpDelta: effect.mpDelta };
  },
  describe(applied, state) {
    return `你进入打坐修炼状态，恢复${applied.hp}点生命和${applied.mp}点仙力（连续打坐${state.character.meditationStreak}次）`;
  },
};

const consumePill: ActionHandler = {
  validate(state) {
    if (state.character.inventory.pillCount < 1) {
      return new InsufficientResourceError('没有丹药可用', { requested: 1, available: 0 });
    }
    return null;
  },
  plan(state, rules) {
    const effect = rules.pillEffect(state.difficulty);
    return { ...NO_EFFECT, hpDelta: effect.hpDelta, mpDelta: effect.mpDelta, pillCost: 1 };
  },
  describe(applied, state) {
    return `你服下一颗丹药，恢复${applied.hp}点生命和${applied.mp}点仙力，剩余丹药${state.character.inventory.pillCount}颗`;
  },
};

const cultivate: ActionHandler = {
  validate(state, rules) {
    const cost = rules.cultivationCost(state.difficulty);
    const mana = state.character.mana.current;
    if (mana < cost) {
      return new InsufficientResourceError(`仙力不足，无法修炼（需要${cost}点，当前${mana}点）`, {
        required: cost,
        available: mana,
      });
    }
    return null;
  },
  plan(state, rules) {
    const { character, difficulty } = state;
    return {
      ...NO_EFFECT,
      mpDelta: -rules.cultivationCost(difficulty),
      experienceDelta: rules.cultivationGain(character.talent.value, difficulty, character.meditationStreak),
    };
  },
  describe(applied) {
    return `你运转心法，消耗${-applied.mp}点仙力，修为精进，获得${applied.experience}点经验`;
  },
};

const wait: ActionHandler = {
  validate: () => null,
  plan: () => ({ ...NO_EFFECT }),
  describe: () => '你静心等待，时光悄然流逝',
};

function handlerFor(kind: ActionKind): ActionHandler {
  switch (kind) {
    case 'meditate':
      return meditate;
    case 'consume_pill':
      return consumePill;
    case 'cultivate':
      return cultivate;
    case 'wait':
      return wait;
    default:
      return unknownAction(kind);
  }
}

function unknownAction(kind: never): never {
  throw new InvalidArgumentError(`未知动作: ${String(kind)}`, { kind: String(kind) });
}

// ========== Protocol ==========

export function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

export function actionLabel(kind: ActionKind): string {
  return ACTION_CATALOG[kind].displayName;
}

/**
 * Phase first, then the action's own preconditions
 */
export function validateAction(
  kind: ActionKind,
  state: SessionState,
  rules: RuleEngine
): ActionError | null {
  if (state.phase !== 'active') {
    return new InvalidPhaseError(`游戏已结束（${PHASE_LABELS[state.phase]}），无法继续行动`, {
      phase: state.phase,
      kind,
    });
  }
  return handlerFor(kind).validate(state, rules);
}

/**
 * Apply a validated action. All clamping and checks run before the first
 * mutation, so a throw leaves the character untouched.
 */
export function applyAction(
  kind: ActionKind,
  state: SessionState,
  rules: RuleEngine
): ActionOutcome {
  const error = validateAction(kind, state, rules);
  if (error) {
    throw error;
  }

  const handler = handlerFor(kind);
  const plan = handler.plan(state, rules);
  const { character } = state;

  const hp = character.health.clampDelta(plan.hpDelta);
  const mp = character.mana.clampDelta(plan.mpDelta);
  const breakthroughs = character.experience.preview(plan.experienceDelta);
  if (plan.pillCost > character.inventory.pillCount) {
    throw new InsufficientResourceError('没有丹药可用', {
      requested: plan.pillCost,
      available: character.inventory.pillCount,
    });
  }

  if (plan.pillCost > 0) {
    character.inventory.consume(plan.pillCost);
  }
  character.health.applyDelta(plan.hpDelta);
  character.mana.applyDelta(plan.mpDelta);
  character.experience.add(plan.experienceDelta);
  character.recordAction(kind);

  const applied: AppliedEffects = {
    hp,
    mp,
    experience: plan.experienceDelta,
    pills: plan.pillCost,
  };

  return {
    kind,
    hpApplied: hp,
    mpApplied: mp,
    experienceGained: plan.experienceDelta,
    pillsConsumed: plan.pillCost,
    breakthroughs: breakthroughs.map((stage) => ({ ...stage })),
    message: handler.describe(applied, state),
  };
}

/**
 * Expected effects of an action, computed without touching the state
 */
export function previewAction(
  kind: ActionKind,
  state: SessionState,
  rules: RuleEngine
): ActionPreview {
  const error = validateAction(kind, state, rules);
  if (error) {
    return {
      kind,
      allowed: false,
      error: { code: error.code, message: error.message },
      hpDelta: 0,
      mpDelta: 0,
      experienceDelta: 0,
      pillDelta: 0,
      breakthroughs: [],
    };
  }

  const plan = handlerFor(kind).plan(state, rules);
  const { character } = state;

  return {
    kind,
    allowed: true,
    hpDelta: character.health.clampDelta(plan.hpDelta),
    mpDelta: character.mana.clampDelta(plan.mpDelta),
    experienceDelta: plan.experienceDelta,
    pillDelta: -plan.pillCost,
    breakthroughs: character.experience.preview(plan.experienceDelta).map((stage) => ({ ...stage })),
  };
}
