// API layer: Session routes (composed)
// Shared router with subroutes

import { Router } from 'express';
import type { ISessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import { createCreateRoutes } from './create.js';
import { createStateRoutes } from './state.js';
import { createActionRoutes } from './actions.js';

export function createSessionRouter(registry: ISessionRegistry, defaultDifficulty = 'normal'): Router {
  const router = Router();

  router.use('/', createCreateRoutes(registry, defaultDifficulty));
  router.use('/', createActionRoutes(registry));
  router.use('/', createStateRoutes(registry));

  return router;
}
