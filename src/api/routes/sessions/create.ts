// API layer: Session creation routes

import { Router, type Request, type Response } from 'express';
import type { ISessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import { CreateSessionSchema } from './schemas.js';

export function createCreateRoutes(registry: ISessionRegistry, defaultDifficulty: string): Router {
  const router = Router();

  // Create session
  router.post('/', (req: Request, res: Response) => {
    const { difficulty, talent, characterName } = CreateSessionSchema.parse(req.body ?? {});

    const session = registry.create(difficulty ?? defaultDifficulty, { talent, characterName });

    res.status(201).json({
      success: true,
      sessionId: session.id,
      snapshot: session.snapshot(),
    });
  });

  return router;
}
