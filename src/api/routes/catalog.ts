// API layer: Catalog routes
// Static game data for clients building menus

import { Router, type Request, type Response } from 'express';
import { listDifficultyPresets } from '@/domain/cultivation/difficulty.js';
import { listActionCatalog, STAGES } from '@/domain/cultivation/stages.js';

export function createCatalogRouter(): Router {
  const router = Router();

  router.get('/difficulties', (_req: Request, res: Response) => {
    res.json({ success: true, difficulties: listDifficultyPresets() });
  });

  router.get('/actions', (_req: Request, res: Response) => {
    res.json({ success: true, actions: listActionCatalog() });
  });

  router.get('/stages', (_req: Request, res: Response) => {
    res.json({ success: true, stages: STAGES.map((stage) => ({ ...stage })) });
  });

  return router;
}
