import express, { Router } from 'express';
import { param, query } from 'express-validator';
import { createLookupController } from '../controllers/lookupController.js';
import { validate } from '../middleware/validationMiddleware.js';
import type { GovernanceContext } from '../services/governanceContext.js';
import { asyncHandler } from '../utils/asyncHandler.js';

const validateChainQuery = [
  query('employeeId').isInt({ gt: 0 }).withMessage('Employee id must be a positive integer'),
  query('theater').isString().trim().notEmpty().withMessage('Theater is required'),
];

export const createLookupRoutes = (context: GovernanceContext): Router => {
  const router: Router = express.Router();
  const controller = createLookupController(context);

  router.get('/approval-chain', validateChainQuery, validate, asyncHandler(controller.getApprovalChain));
  router.get('/summary', asyncHandler(controller.getSummary));
  router.get('/accounts/search', [query('q').optional().isString()], validate, asyncHandler(controller.searchAccounts));
  router.get(
    '/accounts/:accountId/opportunities',
    [param('accountId').isString().notEmpty()],
    validate,
    asyncHandler(controller.listAccountOpportunities),
  );
  router.get('/budgets', asyncHandler(controller.listBudgets));
  router.get('/lookup/theaters-industries', asyncHandler(controller.getTheatersAndIndustries));

  return router;
};
