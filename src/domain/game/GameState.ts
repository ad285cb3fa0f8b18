// Domain layer: Session state
// NO external dependencies - pure TypeScript

import type { ICharacter } from '@/domain/character/types.js';
import type { DifficultySettings } from '@/domain/cultivation/types.js';
import type { IEventLog, SessionPhase } from './session.js';

/**
 * Complete state of one play-through.
 * Owns its character and log exclusively; replaced wholesale on restart.
 */
export interface SessionState {
  id: string;
  generation: number;
  phase: SessionPhase;
  difficulty: DifficultySettings;
  character: ICharacter;
  log: IEventLog;
  createdAt: number;
}
