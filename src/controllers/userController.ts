import { Request, Response } from 'express';
import type { GovernanceContext } from '../services/governanceContext.js';
import { queryText, readBody } from '../utils/requestInput.js';

export const createUserController = ({ identity }: GovernanceContext) => ({
  getUser: async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(await identity.getEffectiveUser());
  },

  searchEmployees: async (req: Request, res: Response): Promise<void> => {
    res.status(200).json(await identity.searchEmployees(queryText(req.query.q) ?? ''));
  },

  impersonate: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const user = await identity.impersonate(Number(body.employeeId));
    res.status(200).json({ message: `Now acting as ${user.displayName ?? user.username}`, user });
  },

  stopImpersonate: async (_req: Request, res: Response): Promise<void> => {
    const user = await identity.stopImpersonate();
    res.status(200).json({ message: 'Stopped impersonating', user });
  },

  impersonationStatus: async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(identity.status());
  },
});
