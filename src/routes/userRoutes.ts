import express, { Router } from 'express';
import { body, query } from 'express-validator';
import { createUserController } from '../controllers/userController.js';
import { requireAdmin } from '../middleware/adminMiddleware.js';
import { validate } from '../middleware/validationMiddleware.js';
import type { GovernanceContext } from '../services/governanceContext.js';
import { asyncHandler } from '../utils/asyncHandler.js';

const validateSearch = [query('q').optional().isString()];

const validateImpersonation = [
  body('employeeId').isInt({ gt: 0 }).withMessage('Employee id must be a positive integer'),
];

export const createUserRoutes = (context: GovernanceContext): Router => {
  const router: Router = express.Router();
  const controller = createUserController(context);
  const adminOnly = requireAdmin(context.identity);

  router.get('/user', asyncHandler(controller.getUser));
  router.get('/employees/search', adminOnly, validateSearch, validate, asyncHandler(controller.searchEmployees));
  router.post('/impersonate', adminOnly, validateImpersonation, validate, asyncHandler(controller.impersonate));
  router.post('/stop-impersonate', adminOnly, asyncHandler(controller.stopImpersonate));
  router.get('/impersonate/status', asyncHandler(controller.impersonationStatus));

  return router;
};
