/**
 * BranchAllocator - collision-safe branch naming
 *
 * The platform's atomic ref creation is the only arbiter of a free name:
 * a BranchAlreadyExistsError moves on to the next suffix, anything else
 * propagates untouched.
 *
 * @module branch_allocator
 */

import type { IHostingPlatform } from '../hosting_platform';
import type { BranchAllocatorDependencies, IBranchAllocator } from './branch_allocator.types';
import { BranchAllocationExhaustedError, BranchAlreadyExistsError } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';

export const DEFAULT_BRANCH_ALLOCATION_MAX_RETRIES = 15;

/**
 * Candidate name for the n-th attempt (1-based): `base`, `base-2`, `base-3`, ...
 */
export function branchCandidate(baseName: string, attempt: number): string {
  return attempt === 1 ? baseName : `${baseName}-${attempt}`;
}

export class BranchAllocator implements IBranchAllocator {
  private readonly platform: IHostingPlatform;
  private readonly maxRetries: number;
  private readonly logger: Logger;

  constructor(deps: BranchAllocatorDependencies) {
    this.platform = deps.platform;
    this.maxRetries = deps.maxRetries ?? DEFAULT_BRANCH_ALLOCATION_MAX_RETRIES;
    this.logger = deps.logger ?? createLogger('[BranchAllocator] ');
  }

  async allocate(baseName: string): Promise<string> {
    const tip = await this.platform.getMainBranchTip();
    const attempts = this.maxRetries + 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const candidate = branchCandidate(baseName, attempt);
      try {
        await this.platform.createBranch(candidate, tip);
        this.logger.debug(`Created branch ${candidate} at ${tip}`);
        return candidate;
      } catch (error: unknown) {
        if (!(error instanceof BranchAlreadyExistsError)) {
          throw error;
        }
        this.logger.debug(`Branch ${candidate} is taken`);
      }
    }

    throw new BranchAllocationExhaustedError(baseName, attempts);
  }
}
