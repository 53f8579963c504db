import express, { Router } from 'express';
import { createCacheController } from '../controllers/cacheController.js';
import type { GovernanceContext } from '../services/governanceContext.js';
import { asyncHandler } from '../utils/asyncHandler.js';

export const createCacheRoutes = (context: GovernanceContext): Router => {
  const router: Router = express.Router();
  const controller = createCacheController(context);

  router.get('/progress', asyncHandler(controller.getProgress));
  router.post('/refresh', asyncHandler(controller.triggerRefresh));

  return router;
};
