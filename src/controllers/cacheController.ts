import { Request, Response } from 'express';
import type { GovernanceContext } from '../services/governanceContext.js';

export const createCacheController = ({ refresher }: GovernanceContext) => ({
  getProgress: async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(refresher.getProgress());
  },

  triggerRefresh: async (_req: Request, res: Response): Promise<void> => {
    const result = refresher.triggerRefresh();
    res.status(result.started ? 202 : 409).json({ message: result.message });
  },
});
