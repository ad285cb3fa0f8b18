// API layer: Session state routes
// Read-only views plus quit

import { Router, type Request, type Response } from 'express';
import type { ISessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import { LogQuerySchema, requireSession, SessionParamsSchema } from './schemas.js';
import { createError } from '@/api/middleware/errorHandler.js';

export function createStateRoutes(registry: ISessionRegistry): Router {
  const router = Router();

  router.get('/:sessionId', (req: Request, res: Response) => {
    const session = requireSession(registry, req);
    res.json({ success: true, snapshot: session.snapshot() });
  });

  router.get('/:sessionId/log', (req: Request, res: Response) => {
    const session = requireSession(registry, req);
    const { limit } = LogQuerySchema.parse(req.query);
    res.json({ success: true, entries: session.logEntries(limit) });
  });

  router.get('/:sessionId/statistics', (req: Request, res: Response) => {
    const session = requireSession(registry, req);
    res.json({ success: true, statistics: session.statistics() });
  });

  router.get('/:sessionId/achievements', (req: Request, res: Response) => {
    const session = requireSession(registry, req);
    res.json({ success: true, achievements: session.achievements() });
  });

  // Quit
  router.delete('/:sessionId', (req: Request, res: Response) => {
    const { sessionId } = SessionParamsSchema.parse(req.params);
    if (!registry.delete(sessionId)) {
      throw createError('Session not found', 404, 'SESSION_NOT_FOUND', { sessionId });
    }
    res.status(204).end();
  });

  return router;
}
