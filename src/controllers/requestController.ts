import { Request, Response } from 'express';
import { isRequestStatus } from '../types/approval.js';
import type { RequestFilters } from '../types/request.js';
import type { GovernanceContext } from '../services/governanceContext.js';
import type { MutationResult } from '../services/approvals/requestService.js';
import {
  flag,
  queryText,
  readBody,
  readRequestFields,
  readRevisionFields,
  textOrNull,
} from '../utils/requestInput.js';

const requestIdParam = (req: Request): number => Number.parseInt(req.params.id, 10);

const respond = (res: Response, result: MutationResult, message: string, status = 200): void => {
  res.status(status).json({
    message,
    requestId: result.request?.requestId ?? null,
    request: result.request,
    ...(result.chain ? { chain: result.chain } : {}),
  });
};

export const createRequestController = ({ requests, lookups }: GovernanceContext) => ({
  listRequests: async (req: Request, res: Response): Promise<void> => {
    const status = queryText(req.query.status);
    const filters: RequestFilters = {
      theater: queryText(req.query.theater),
      industrySegment: queryText(req.query.industrySegment),
      quarter: queryText(req.query.quarter),
      status: isRequestStatus(status) ? status : undefined,
    };
    res.status(200).json(await requests.listRequests(filters));
  },

  getRequest: async (req: Request, res: Response): Promise<void> => {
    res.status(200).json(await requests.getRequest(requestIdParam(req)));
  },

  listApprovalSteps: async (req: Request, res: Response): Promise<void> => {
    res.status(200).json(await requests.listApprovalSteps(requestIdParam(req)));
  },

  createRequest: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const autoSubmit = flag(body, 'autoSubmit');
    const result = await requests.createRequest(readRequestFields(body), {
      autoSubmit,
      submitComment: textOrNull(body, 'submitComment'),
    });
    respond(res, result, autoSubmit ? 'Request created and submitted' : 'Request created', 201);
  },

  updateRequest: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const autoSubmit = flag(body, 'autoSubmit');
    const result = await requests.updateRequest(requestIdParam(req), readRequestFields(body), {
      autoSubmit,
      submitComment: textOrNull(body, 'submitComment'),
      draftComment: textOrNull(body, 'draftComment'),
    });
    respond(res, result, autoSubmit ? 'Request updated and submitted' : 'Request updated');
  },

  deleteRequest: async (req: Request, res: Response): Promise<void> => {
    const requestId = requestIdParam(req);
    await requests.deleteRequest(requestId);
    res.status(200).json({ message: 'Request deleted', requestId });
  },

  submitRequest: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const result = await requests.submitRequest(requestIdParam(req), textOrNull(body, 'comment'));
    respond(res, result, 'Request submitted for approval');
  },

  withdrawRequest: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const result = await requests.withdrawRequest(requestIdParam(req), textOrNull(body, 'comment'));
    respond(res, result, 'Request withdrawn to draft');
  },

  approveRequest: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const result = await requests.approveRequest(requestIdParam(req), textOrNull(body, 'comments'));
    respond(res, result, result.request?.status === 'FINAL_APPROVED' ? 'Request fully approved' : 'Request approved');
  },

  rejectRequest: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const result = await requests.rejectRequest(requestIdParam(req), textOrNull(body, 'comments'));
    respond(res, result, 'Request rejected');
  },

  reviseRequest: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const submit = flag(body, 'submit');
    const result = await requests.reviseRequest(requestIdParam(req), readRevisionFields(body), {
      submit,
      comment: textOrNull(body, 'comment'),
    });
    respond(res, result, submit ? 'Request revised and resubmitted' : 'Request revised and moved to draft');
  },

  sendBack: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const result = await requests.sendBack(requestIdParam(req), textOrNull(body, 'comments'));
    respond(res, result, 'Request sent back for revision');
  },

  denyRequest: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    const result = await requests.denyRequest(requestIdParam(req), textOrNull(body, 'comments'));
    respond(res, result, 'Request denied');
  },

  listOpportunities: async (req: Request, res: Response): Promise<void> => {
    res.status(200).json(await lookups.listRequestOpportunities(requestIdParam(req)));
  },

  linkOpportunity: async (req: Request, res: Response): Promise<void> => {
    const body = readBody(req.body);
    await lookups.linkOpportunity(requestIdParam(req), String(body.opportunityId));
    res.status(201).json({ message: 'Opportunity linked' });
  },

  unlinkOpportunity: async (req: Request, res: Response): Promise<void> => {
    await lookups.unlinkOpportunity(requestIdParam(req), req.params.opportunityId);
    res.status(200).json({ message: 'Opportunity unlinked' });
  },
});
