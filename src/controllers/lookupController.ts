import { Request, Response } from 'express';
import type { GovernanceContext } from '../services/governanceContext.js';
import { queryText } from '../utils/requestInput.js';

export const createLookupController = ({ requests, lookups }: GovernanceContext) => ({
  getApprovalChain: async (req: Request, res: Response): Promise<void> => {
    const employeeId = Number(req.query.employeeId);
    const theater = queryText(req.query.theater) ?? '';
    res.status(200).json(await requests.resolveApprovalChain(employeeId, theater));
  },

  getSummary: async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(await lookups.getSummary());
  },

  searchAccounts: async (req: Request, res: Response): Promise<void> => {
    res.status(200).json(await lookups.searchAccounts(queryText(req.query.q) ?? ''));
  },

  getTheatersAndIndustries: async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(await lookups.getTheatersAndIndustries());
  },

  listBudgets: async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(await lookups.listBudgets());
  },

  listAccountOpportunities: async (req: Request, res: Response): Promise<void> => {
    res.status(200).json(await lookups.listAccountOpportunities(req.params.accountId));
  },
});
