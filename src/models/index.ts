import 'reflect-metadata';
import CacheMetadata from './CacheMetadata.js';
import CachedAccount from './CachedAccount.js';
import CachedApprovalStep from './CachedApprovalStep.js';
import CachedCurrentUser from './CachedCurrentUser.js';
import CachedFinalApprover from './CachedFinalApprover.js';
import CachedRequest from './CachedRequest.js';

export const cacheModels = [
  CachedRequest,
  CachedApprovalStep,
  CacheMetadata,
  CachedCurrentUser,
  CachedFinalApprover,
  CachedAccount,
];

export { CacheMetadata, CachedAccount, CachedApprovalStep, CachedCurrentUser, CachedFinalApprover, CachedRequest };
