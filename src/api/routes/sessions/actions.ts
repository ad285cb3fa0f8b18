// API layer: Session action routes
// Rejected actions are game outcomes and answer 200 with success: false

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ISessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import {
  ActionKindSchema,
  ActionRequestSchema,
  requireSession,
  RestartSessionSchema,
} from './schemas.js';

const PreviewParamsSchema = z.object({
  action: ActionKindSchema,
});

export function createActionRoutes(registry: ISessionRegistry): Router {
  const router = Router();

  router.post('/:sessionId/actions', (req: Request, res: Response) => {
    const session = requireSession(registry, req);
    const { action } = ActionRequestSchema.parse(req.body);

    res.json(session.applyAction(action));
  });

  router.get('/:sessionId/preview/:action', (req: Request, res: Response) => {
    const session = requireSession(registry, req);
    const { action } = PreviewParamsSchema.parse(req.params);

    res.json({ success: true, preview: session.previewAction(action) });
  });

  router.post('/:sessionId/restart', (req: Request, res: Response) => {
    const session = requireSession(registry, req);
    const { difficulty, talent, characterName } = RestartSessionSchema.parse(req.body ?? {});

    session.restart(difficulty, { talent, characterName });
    res.json({ success: true, snapshot: session.snapshot() });
  });

  return router;
}
