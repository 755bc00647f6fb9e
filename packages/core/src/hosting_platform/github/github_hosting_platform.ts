/**
 * GitHubHostingPlatform - GitHub REST API implementation of IHostingPlatform
 *
 * Every call goes through the injected Octokit instance:
 * - Refs API: main tip, branch creation (422 = name taken)
 * - Trees API: directory listings
 * - Contents API: conditional file writes and deletes
 * - Pulls / Issues API: pull request creation, labels, paginated listing
 *
 * @module hosting_platform/github
 */

import type { Octokit } from '@octokit/rest';
import type { IHostingPlatform } from '../hosting_platform';
import type {
  DirectoryEntry,
  FileDeletion,
  FileWrite,
  PullRequestDraft,
  PullRequestRef,
  PullRequestSummary,
} from '../hosting_platform.types';
import type {
  GitHubHostingPlatformOptions,
  GitHubPullRequestListItem,
} from './github_hosting_platform.types';
import { BranchAlreadyExistsError, ConflictError } from '../../errors';
import { isOctokitRequestError, mapOctokitError } from './octokit_errors';

export class GitHubHostingPlatform implements IHostingPlatform {
  readonly mainBranch: string;
  private readonly owner: string;
  private readonly repo: string;
  private readonly octokit: Octokit;

  constructor(options: GitHubHostingPlatformOptions, octokit: Octokit) {
    this.owner = options.owner;
    this.repo = options.repo;
    this.mainBranch = options.mainBranch ?? 'main';
    this.octokit = octokit;
  }

  async getMainBranchTip(): Promise<string> {
    try {
      const { data } = await this.octokit.rest.git.getRef({
        owner: this.owner,
        repo: this.repo,
        ref: `heads/${this.mainBranch}`,
      });
      return data.object.sha;
    } catch (error: unknown) {
      throw mapOctokitError(error, 'getMainBranchTip', this.mainBranch);
    }
  }

  /**
   * GitHub answers 422 "Reference already exists" for a taken name.
   */
  async createBranch(name: string, fromCommit: string): Promise<void> {
    try {
      await this.octokit.rest.git.createRef({
        owner: this.owner,
        repo: this.repo,
        ref: `refs/heads/${name}`,
        sha: fromCommit,
      });
    } catch (error: unknown) {
      if (isOctokitRequestError(error) && error.status === 422) {
        throw new BranchAlreadyExistsError(name);
      }
      throw mapOctokitError(error, 'createBranch', name);
    }
  }

  /**
   * Reads the tree at `<ref>:<path>` through the Git Trees API, which is not
   * capped at 1000 entries like the Contents API. 404 (no such path) and
   * 422 (path is not a tree) both mean "no such directory".
   */
  async getDirectoryListing(ref: string, path: string): Promise<DirectoryEntry[] | null> {
    let data: Awaited<ReturnType<Octokit['rest']['git']['getTree']>>['data'];
    try {
      ({ data } = await this.octokit.rest.git.getTree({
        owner: this.owner,
        repo: this.repo,
        tree_sha: path === '' ? ref : `${ref}:${path}`,
      }));
    } catch (error: unknown) {
      if (isOctokitRequestError(error) && (error.status === 404 || error.status === 422)) {
        return null;
      }
      throw mapOctokitError(error, 'getDirectoryListing', `${ref}:${path}`);
    }

    const entries: DirectoryEntry[] = [];
    for (const item of data.tree ?? []) {
      if (!item.path || !item.sha) {
        continue;
      }
      entries.push({
        name: item.path,
        sha: item.sha,
        type: item.type === 'blob' ? 'file' : item.type === 'tree' ? 'dir' : 'other',
      });
    }
    return entries;
  }

  /**
   * Omitting `sha` asks GitHub to create the file; it answers 422 when the
   * file exists after all, and 409 when the given SHA is stale.
   */
  async writeFile(change: FileWrite): Promise<void> {
    try {
      await this.octokit.rest.repos.createOrUpdateFileContents({
        owner: this.owner,
        repo: this.repo,
        path: change.path,
        message: change.message,
        content: Buffer.from(change.content).toString('base64'),
        branch: change.branch,
        ...(change.expected.kind === 'existing' ? { sha: change.expected.sha } : {}),
      });
    } catch (error: unknown) {
      throw mapOctokitError(error, 'writeFile', `${change.branch}:${change.path}`);
    }
  }

  async deleteFile(change: FileDeletion): Promise<void> {
    if (change.expected.kind === 'new') {
      throw new ConflictError(
        `Cannot delete ${change.path}: no blob on ${this.mainBranch}`,
        'deleteFile',
        `${change.branch}:${change.path}`,
      );
    }

    try {
      await this.octokit.rest.repos.deleteFile({
        owner: this.owner,
        repo: this.repo,
        path: change.path,
        message: change.message,
        sha: change.expected.sha,
        branch: change.branch,
      });
    } catch (error: unknown) {
      throw mapOctokitError(error, 'deleteFile', `${change.branch}:${change.path}`);
    }
  }

  async createPullRequest(draft: PullRequestDraft): Promise<PullRequestRef> {
    try {
      const { data } = await this.octokit.rest.pulls.create({
        owner: this.owner,
        repo: this.repo,
        head: draft.head,
        base: draft.base,
        title: draft.title,
        body: draft.body,
        maintainer_can_modify: true,
      });
      return { number: data.number, url: data.html_url };
    } catch (error: unknown) {
      throw mapOctokitError(error, 'createPullRequest', draft.head);
    }
  }

  async setLabels(pullRequestNumber: number, labels: string[]): Promise<void> {
    try {
      await this.octokit.rest.issues.setLabels({
        owner: this.owner,
        repo: this.repo,
        issue_number: pullRequestNumber,
        labels,
      });
    } catch (error: unknown) {
      throw mapOctokitError(error, 'setLabels', `#${pullRequestNumber}`);
    }
  }

  /**
   * Pages are requested lazily, one per exhausted page.
   */
  async *listPullRequests(): AsyncGenerator<PullRequestSummary> {
    const pages = this.octokit.paginate.iterator(this.octokit.rest.pulls.list, {
      owner: this.owner,
      repo: this.repo,
      state: 'all',
      per_page: 100,
    });

    try {
      for await (const page of pages) {
        for (const pr of page.data) {
          yield toPullRequestSummary(pr);
        }
      }
    } catch (error: unknown) {
      throw mapOctokitError(error, 'listPullRequests', `${this.owner}/${this.repo}`);
    }
  }
}

function toPullRequestSummary(pr: GitHubPullRequestListItem): PullRequestSummary {
  return {
    number: pr.number,
    body: pr.body,
    htmlUrl: pr.html_url,
    createdAt: pr.created_at,
    state: pr.state,
    mergedAt: pr.merged_at,
  };
}
