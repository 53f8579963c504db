import express, { Router } from 'express';
import { body, param, query } from 'express-validator';
import { createRequestController } from '../controllers/requestController.js';
import { validate } from '../middleware/validationMiddleware.js';
import type { GovernanceContext } from '../services/governanceContext.js';
import { REQUEST_STATUSES } from '../types/approval.js';
import { asyncHandler } from '../utils/asyncHandler.js';

// Temporary ids of unsynced requests are negative.
const validateId = [param('id').isInt().withMessage('ID must be an integer')];

const validateFilters = [
  query('status').optional().isIn([...REQUEST_STATUSES]).withMessage('Unknown request status'),
  query(['theater', 'industrySegment', 'quarter']).optional().isString(),
];

const validateRequestBody = [
  body('requestedAmount').optional({ values: 'null' }).isFloat({ min: 0 }).withMessage('Requested amount must be a non-negative number'),
  body(['requestTitle', 'accountName', 'theater', 'industrySegment', 'investmentQuarter'])
    .optional({ values: 'null' })
    .isString(),
  body('autoSubmit').optional().isBoolean(),
];

const validateComment = [body(['comment', 'comments']).optional({ values: 'null' }).isString()];

const validateRevision = [
  body(['businessJustification', 'expectedOutcome', 'riskAssessment']).optional({ values: 'null' }).isString(),
  body('submit').optional().isBoolean(),
  ...validateComment,
];

const validateOpportunity = [
  body('opportunityId').isString().trim().notEmpty().withMessage('Opportunity id is required'),
];

export const createRequestRoutes = (context: GovernanceContext): Router => {
  const router: Router = express.Router();
  const controller = createRequestController(context);

  router.get('/', validateFilters, validate, asyncHandler(controller.listRequests));
  router.post('/', validateRequestBody, validate, asyncHandler(controller.createRequest));
  router.get('/:id', validateId, validate, asyncHandler(controller.getRequest));
  router.put('/:id', [...validateId, ...validateRequestBody], validate, asyncHandler(controller.updateRequest));
  router.delete('/:id', validateId, validate, asyncHandler(controller.deleteRequest));
  router.get('/:id/steps', validateId, validate, asyncHandler(controller.listApprovalSteps));

  router.post('/:id/submit', [...validateId, ...validateComment], validate, asyncHandler(controller.submitRequest));
  router.post('/:id/withdraw', [...validateId, ...validateComment], validate, asyncHandler(controller.withdrawRequest));
  router.post('/:id/approve', [...validateId, ...validateComment], validate, asyncHandler(controller.approveRequest));
  router.post('/:id/reject', [...validateId, ...validateComment], validate, asyncHandler(controller.rejectRequest));
  router.post('/:id/revise', [...validateId, ...validateRevision], validate, asyncHandler(controller.reviseRequest));
  router.post('/:id/send-back', [...validateId, ...validateComment], validate, asyncHandler(controller.sendBack));
  router.post('/:id/deny', [...validateId, ...validateComment], validate, asyncHandler(controller.denyRequest));

  router.get('/:id/opportunities', validateId, validate, asyncHandler(controller.listOpportunities));
  router.post(
    '/:id/opportunities',
    [...validateId, ...validateOpportunity],
    validate,
    asyncHandler(controller.linkOpportunity),
  );
  router.delete('/:id/opportunities/:opportunityId', validateId, validate, asyncHandler(controller.unlinkOpportunity));

  return router;
};
