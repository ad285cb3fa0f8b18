// API layer: Session request schemas

import { z } from 'zod';
import type { Request } from 'express';
import type { GameSession } from '@/application/game/GameSession.js';
import { createError } from '@/api/middleware/errorHandler.js';
import type { ISessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import { isActionKind } from '@/application/game/actions.js';
import { ACTION_KINDS } from '@/domain/cultivation/types.js';

export const ActionKindSchema = z
  .string()
  .refine(isActionKind, { message: `action must be one of: ${ACTION_KINDS.join(', ')}` });

export const DifficultySettingsSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  talentRange: z.object({
    min: z.number().int(),
    max: z.number().int(),
  }),
  initialPillCount: z.number().int().nonnegative(),
  experienceMultiplier: z.number().positive(),
  recoveryMultiplier: z.number().positive(),
});

export const DifficultySchema = z.union([z.string().min(1), DifficultySettingsSchema]);

export const CreateSessionSchema = z.object({
  difficulty: DifficultySchema.optional(),
  talent: z.number().int().optional(),
  characterName: z.string().trim().min(1).max(32).optional(),
});

export const RestartSessionSchema = z.object({
  difficulty: DifficultySchema.optional(),
  talent: z.number().int().optional(),
  characterName: z.string().trim().min(1).max(32).optional(),
});

export const ActionRequestSchema = z.object({
  action: ActionKindSchema,
});

export const SessionParamsSchema = z.object({
  sessionId: z.string().uuid(),
});

export const LogQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).optional(),
});

/**
 * Resolve :sessionId or fail with 404
 */
export function requireSession(registry: ISessionRegistry, req: Request): GameSession {
  const { sessionId } = SessionParamsSchema.parse(req.params);
  const session = registry.get(sessionId);
  if (!session) {
    throw createError('Session not found', 404, 'SESSION_NOT_FOUND', { sessionId });
  }
  return session;
}
