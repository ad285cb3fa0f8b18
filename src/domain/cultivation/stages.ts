// Domain layer: Stage ladder and action catalog
// Pure constants - no dependencies

import type { ActionInfo, ActionKind, StageLevel } from './types.js';

/**
 * The six tiers, in ascending order. Thresholds are cumulative:
 * each tier needs 100, 200, 400, 800, 1600 more experience than the last.
 */
export const STAGES: readonly StageLevel[] = [
  { ordinal: 0, key: 'qi_refining', name: '炼气期', threshold: 0, terminal: false, powerMultiplier: 1.0 },
  { ordinal: 1, key: 'foundation', name: '筑基期', threshold: 100, terminal: false, powerMultiplier: 1.5 },
  { ordinal: 2, key: 'core_formation', name: '结丹期', threshold: 300, terminal: false, powerMultiplier: 2.5 },
  { ordinal: 3, key: 'nascent_soul', name: '元婴期', threshold: 700, terminal: false, powerMultiplier: 4.0 },
  { ordinal: 4, key: 'spirit_transformation', name: '化神期', threshold: 1500, terminal: false, powerMultiplier: 6.0 },
  { ordinal: 5, key: 'ascension', name: '飞升', threshold: 3100, terminal: true, powerMultiplier: 10.0 },
];

export const TERMINAL_STAGE_ORDINAL = STAGES.length - 1;

/**
 * Display metadata for each action, in menu order
 */
export const ACTION_CATALOG: Record<ActionKind, ActionInfo> = {
  meditate: {
    kind: 'meditate',
    displayName: '打坐',
    description: '进入冥想状态，调息恢复生命与仙力',
    sortOrder: 1,
  },
  consume_pill: {
    kind: 'consume_pill',
    displayName: '吃丹药',
    description: '服用丹药快速恢复生命力和仙力',
    sortOrder: 2,
  },
  cultivate: {
    kind: 'cultivate',
    displayName: '修炼',
    description: '运转心法，消耗仙力大量提升修为',
    sortOrder: 3,
  },
  wait: {
    kind: 'wait',
    displayName: '等待',
    description: '静心养神，让时间流逝',
    sortOrder: 4,
  },
};

export function listActionCatalog(): ActionInfo[] {
  return Object.values(ACTION_CATALOG)
    .sort((a, b) => a.sortOrder - b.sortOrder)
    .map((info) => ({ ...info }));
}
