import type { Approver, FinalApprover } from '../../types/approval.js';
import type { RemoteStore } from '../../types/remote.js';
import logger from '../../utils/logger.js';
import type { CacheStore } from '../cache/cacheStore.js';

export const MAX_CHAIN_LEVEL = 10;

/**
 * Builds the ordered list of approvers for a request: the employee's
 * management line up to the theater's final approver.
 */
export class ApprovalChainResolver {
  constructor(
    private readonly cache: CacheStore,
    private readonly remote: Pick<RemoteStore, 'findFinalApprover' | 'getEmployee'>,
  ) {}

  async findFinalApprover(theater: string): Promise<FinalApprover | null> {
    const cached = await this.cache.findFinalApprover(theater);
    if (cached) {
      return cached;
    }
    return this.remote.findFinalApprover(theater);
  }

  async resolve(employeeId: number, theater: string): Promise<Approver[]> {
    const finalApprover = await this.findFinalApprover(theater);
    if (!finalApprover) {
      logger.warn(`[approval-chain] No final approver configured for theater "${theater}"`);
      return [];
    }

    const employee = await this.remote.getEmployee(employeeId);
    if (!employee || !employee.active) {
      logger.warn(`[approval-chain] Employee ${employeeId} has no active hierarchy record`);
      return [];
    }

    const chain: Approver[] = [];
    const visited = new Set<number>([employee.employeeId]);
    let managerId = employee.managerId;
    let level = 1;

    while (managerId !== null && level < MAX_CHAIN_LEVEL) {
      if (visited.has(managerId)) {
        logger.warn(`[approval-chain] Reporting loop detected at employee ${managerId}`);
        break;
      }
      const manager = await this.remote.getEmployee(managerId);
      if (!manager || !manager.active) {
        break;
      }
      visited.add(manager.employeeId);
      level += 1;
      const isFinal = manager.employeeId === finalApprover.approverEmployeeId;
      chain.push({
        employeeId: manager.employeeId,
        name: manager.name,
        title: manager.title,
        level,
        isFinal,
      });
      if (isFinal) {
        return chain;
      }
      managerId = manager.managerId;
    }

    const last = chain.at(-1);
    chain.push({
      employeeId: finalApprover.approverEmployeeId,
      name: finalApprover.approverName,
      title: finalApprover.approverTitle,
      level: last ? last.level + 1 : 2,
      isFinal: true,
    });
    return chain;
  }
}
