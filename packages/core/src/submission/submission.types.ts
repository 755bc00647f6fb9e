/**
 * Types for the submission workflow.
 *
 * @module submission
 */

import type { IHostingPlatform, PullRequestRef } from '../hosting_platform';
import type { IBranchAllocator } from '../branch_allocator';
import type { IContentLocator } from '../content_locator';
import type { ChangeDescriptor } from '../change_descriptor';
import type { Logger } from '../logger';

/** File written on the submission branch. */
export type SubmissionFile = {
  /** Repository path */
  path: string;
  content: Uint8Array;
};

/**
 * One submission: a branch, at most one write and one delete, and a pull
 * request. With neither `create` nor `delete` the pull request is empty.
 */
export type SubmissionRequest = {
  /** Desired branch name; a numeric suffix is added on collision */
  branchBaseName: string;
  title: string;
  /** Pull request description, normally an encoded change descriptor */
  body: string;
  create?: SubmissionFile;
  /** Repository path to remove */
  delete?: string;
  labels?: string[];
};

export type SubmissionReceipt = {
  /** Branch actually allocated */
  branch: string;
  pullRequest: PullRequestRef;
};

export type SubmissionOrchestratorDependencies = {
  platform: IHostingPlatform;
  /** Default: BranchAllocator over `platform` */
  allocator?: IBranchAllocator;
  /** Default: ContentLocator over `platform` */
  locator?: IContentLocator;
  logger?: Logger;
};

export type SubmissionListerDependencies = {
  platform: IHostingPlatform;
  logger?: Logger;
};

export interface ISubmissionOrchestrator {
  submit(request: SubmissionRequest): Promise<SubmissionReceipt>;
}

export interface ISubmissionLister {
  /**
   * Every submission, optionally only those of `user`, rebuilt from the
   * pull requests. Each iteration re-queries the platform.
   */
  listFor(user?: string): AsyncGenerator<ChangeDescriptor>;
}
