/**
 * SubmissionLister - submissions rebuilt from pull requests
 *
 * @module submission
 */

import type { IHostingPlatform } from '../hosting_platform';
import { decodeChangeDescriptor } from '../change_descriptor';
import type { ChangeDescriptor } from '../change_descriptor';
import { resolveSubmissionStatus } from '../status_resolver';
import { DescriptorDecodeError } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { ISubmissionLister, SubmissionListerDependencies } from './submission.types';

export class SubmissionLister implements ISubmissionLister {
  private readonly platform: IHostingPlatform;
  private readonly logger: Logger;

  constructor(deps: SubmissionListerDependencies) {
    this.platform = deps.platform;
    this.logger = deps.logger ?? createLogger('[SubmissionLister] ');
  }

  /**
   * Pull requests whose body is not a change descriptor were opened outside
   * this workflow; they are logged and skipped.
   */
  async *listFor(user?: string): AsyncGenerator<ChangeDescriptor> {
    for await (const pr of this.platform.listPullRequests()) {
      let descriptor: ChangeDescriptor;
      try {
        descriptor = decodeChangeDescriptor(pr.body, {
          url: pr.htmlUrl,
          status: resolveSubmissionStatus(pr.state, pr.mergedAt),
          createdAt: pr.createdAt,
        });
      } catch (error: unknown) {
        if (error instanceof DescriptorDecodeError) {
          this.logger.info(`Skipping pull request #${pr.number}: ${error.message}`);
          continue;
        }
        throw error;
      }

      if (user === undefined || descriptor.user === user) {
        yield descriptor;
      }
    }
  }
}
