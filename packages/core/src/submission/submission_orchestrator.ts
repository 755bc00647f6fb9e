/**
 * SubmissionOrchestrator - branch, commit and pull request for one change
 *
 * Steps run in order and are not transactional: a failure leaves the
 * branch and any write already made in place. Every step logs the branch
 * name so orphans can be cleaned up.
 *
 * @module submission
 */

import type { IHostingPlatform } from '../hosting_platform';
import { BranchAllocator } from '../branch_allocator';
import type { IBranchAllocator } from '../branch_allocator';
import { ContentLocator } from '../content_locator';
import type { IContentLocator } from '../content_locator';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type {
  ISubmissionOrchestrator,
  SubmissionOrchestratorDependencies,
  SubmissionReceipt,
  SubmissionRequest,
} from './submission.types';

export function addCommitMessage(path: string): string {
  return `Add ${path} for pull request submission`;
}

export function deleteCommitMessage(path: string): string {
  return `Delete ${path} for pull request submission`;
}

export class SubmissionOrchestrator implements ISubmissionOrchestrator {
  private readonly platform: IHostingPlatform;
  private readonly allocator: IBranchAllocator;
  private readonly locator: IContentLocator;
  private readonly logger: Logger;

  constructor(deps: SubmissionOrchestratorDependencies) {
    this.platform = deps.platform;
    this.logger = deps.logger ?? createLogger('[Submission] ');
    this.allocator = deps.allocator ?? new BranchAllocator({ platform: deps.platform, logger: this.logger });
    this.locator = deps.locator ?? new ContentLocator({ platform: deps.platform });
  }

  /**
   * @throws ConflictError when main changed between locating and writing
   * @throws BranchAllocationExhaustedError when every candidate name is taken
   */
  async submit(request: SubmissionRequest): Promise<SubmissionReceipt> {
    const branch = await this.allocator.allocate(request.branchBaseName);
    this.logger.info(`Allocated branch ${branch}`);

    if (request.create) {
      const { path, content } = request.create;
      const expected = await this.locator.locate(path);
      await this.platform.writeFile({
        branch,
        path,
        content,
        expected,
        message: addCommitMessage(path),
      });
      this.logger.info(`Wrote ${path} on ${branch} (${expected.kind})`);
    }

    if (request.delete !== undefined) {
      const path = request.delete;
      const expected = await this.locator.locate(path);
      await this.platform.deleteFile({
        branch,
        path,
        expected,
        message: deleteCommitMessage(path),
      });
      this.logger.info(`Deleted ${path} on ${branch}`);
    }

    const pullRequest = await this.platform.createPullRequest({
      head: branch,
      base: this.platform.mainBranch,
      title: request.title,
      body: request.body,
    });
    this.logger.info(`Opened pull request #${pullRequest.number} from ${branch}`);

    if (request.labels && request.labels.length > 0) {
      await this.platform.setLabels(pullRequest.number, request.labels);
    }

    return { branch, pullRequest };
  }
}
