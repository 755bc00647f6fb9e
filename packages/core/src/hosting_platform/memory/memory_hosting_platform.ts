/**
 * MemoryHostingPlatform - In-memory hosting platform for tests
 *
 * Branches point at immutable snapshots (path -> bytes). Every write or
 * delete produces a new snapshot and moves the branch, so a branch created
 * from an older tip keeps seeing the older files.
 *
 * Test Helpers:
 * - commitFiles(files, branch?): Commit file contents
 * - removeFile(path, branch?): Commit a deletion
 * - addPullRequest(seed): Seed a pull request with an arbitrary body
 * - mergePullRequest(n) / closePullRequest(n): Finish a pull request
 * - readFile(branch, path), getBranchNames(), getPullRequests()
 * - clear(): Reset all state
 *
 * @module hosting_platform/memory
 */

import { createHash } from 'crypto';
import type { IHostingPlatform } from '../hosting_platform';
import type {
  ContentToken,
  DirectoryEntry,
  FileDeletion,
  FileWrite,
  PullRequestDraft,
  PullRequestRef,
  PullRequestSummary,
} from '../hosting_platform.types';
import type {
  MemoryHostingPlatformOptions,
  MemoryPullRequest,
  MemoryPullRequestSeed,
} from './memory_hosting_platform.types';
import {
  BranchAlreadyExistsError,
  ConflictError,
  HostingPlatformError,
} from '../../errors';

type Snapshot = ReadonlyMap<string, Uint8Array>;

interface MemoryHostingState {
  commits: Map<string, Snapshot>;
  branches: Map<string, string>;
  pullRequests: MemoryPullRequest[];
  commitCount: number;
}

/**
 * Git blob identity: sha1 over "blob <length>\0<content>".
 */
export function blobSha(content: Uint8Array): string {
  return createHash('sha1')
    .update(`blob ${content.byteLength}\0`)
    .update(content)
    .digest('hex');
}

export class MemoryHostingPlatform implements IHostingPlatform {
  readonly mainBranch: string;
  private readonly baseUrl: string;
  private readonly now: () => Date;
  private state: MemoryHostingState;

  constructor(options: MemoryHostingPlatformOptions = {}) {
    this.mainBranch = options.mainBranch ?? 'main';
    this.baseUrl = options.baseUrl ?? 'https://hosting.test/catalog';
    this.now = options.now ?? (() => new Date());
    this.state = this.initialState();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /** Commits text files onto `branch` and returns the new commit SHA. */
  commitFiles(files: Record<string, string>, branch: string = this.mainBranch): string {
    const next = new Map(this.snapshotOf(branch, 'commitFiles'));
    for (const [path, content] of Object.entries(files)) {
      next.set(path, Buffer.from(content, 'utf8'));
    }
    return this.commit(branch, next);
  }

  removeFile(path: string, branch: string = this.mainBranch): string {
    const next = new Map(this.snapshotOf(branch, 'removeFile'));
    next.delete(path);
    return this.commit(branch, next);
  }

  /** Content of `path` at a branch or commit, null when absent. */
  readFile(ref: string, path: string): string | null {
    const content = this.snapshotOf(ref, 'readFile').get(path);
    return content === undefined ? null : Buffer.from(content).toString('utf8');
  }

  getBranchNames(): string[] {
    return [...this.state.branches.keys()];
  }

  getBranchTip(name: string): string | undefined {
    return this.state.branches.get(name);
  }

  /** Pull requests in creation order. */
  getPullRequests(): MemoryPullRequest[] {
    return this.state.pullRequests.map(pr => ({ ...pr, labels: [...pr.labels] }));
  }

  /** Seeds a pull request without requiring its branches to exist. */
  addPullRequest(seed: MemoryPullRequestSeed): number {
    const number = this.state.pullRequests.length + 1;
    this.state.pullRequests.push({
      number,
      head: seed.head ?? `seed-${number}`,
      base: seed.base ?? this.mainBranch,
      title: seed.title ?? `Pull request ${number}`,
      body: seed.body,
      labels: seed.labels ? [...seed.labels] : [],
      state: seed.state ?? 'open',
      createdAt: seed.createdAt ?? this.now(),
      mergedAt: seed.mergedAt ?? null,
      url: `${this.baseUrl}/pull/${number}`,
    });
    return number;
  }

  /** Fast-forwards the base branch to the head tip and closes the pull request. */
  mergePullRequest(number: number): void {
    const pr = this.findPullRequest(number, 'mergePullRequest');
    const headTip = this.state.branches.get(pr.head);
    if (headTip !== undefined) {
      this.state.branches.set(pr.base, headTip);
    }
    pr.state = 'closed';
    pr.mergedAt = this.now();
  }

  closePullRequest(number: number): void {
    this.findPullRequest(number, 'closePullRequest').state = 'closed';
  }

  clear(): void {
    this.state = this.initialState();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IHostingPlatform
  // ═══════════════════════════════════════════════════════════════════════

  async getMainBranchTip(): Promise<string> {
    return this.tipOf(this.mainBranch, 'getMainBranchTip');
  }

  async createBranch(name: string, fromCommit: string): Promise<void> {
    if (this.state.branches.has(name)) {
      throw new BranchAlreadyExistsError(name);
    }
    if (!this.state.commits.has(fromCommit)) {
      throw new HostingPlatformError(
        `Unknown commit ${fromCommit}`,
        'BAD_REQUEST',
        'createBranch',
        name,
      );
    }
    this.state.branches.set(name, fromCommit);
  }

  async getDirectoryListing(ref: string, path: string): Promise<DirectoryEntry[] | null> {
    const snapshot = this.snapshotOf(ref, 'getDirectoryListing');
    const prefix = path === '' ? '' : `${path}/`;
    const files = new Map<string, string>();
    const dirs = new Map<string, string[]>();

    for (const [filePath, content] of snapshot) {
      if (!filePath.startsWith(prefix)) {
        continue;
      }
      const rest = filePath.slice(prefix.length);
      const slash = rest.indexOf('/');
      if (slash === -1) {
        files.set(rest, blobSha(content));
      } else {
        const name = rest.slice(0, slash);
        dirs.set(name, [...(dirs.get(name) ?? []), `${rest}:${blobSha(content)}`]);
      }
    }

    if (files.size === 0 && dirs.size === 0 && path !== '') {
      return null;
    }

    const entries: DirectoryEntry[] = [
      ...[...dirs].map(([name, children]): DirectoryEntry => ({
        name,
        sha: createHash('sha1').update(`tree ${children.sort().join('\n')}`).digest('hex'),
        type: 'dir',
      })),
      ...[...files].map(([name, sha]): DirectoryEntry => ({ name, sha, type: 'file' })),
    ];
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  async writeFile(change: FileWrite): Promise<void> {
    const target = `${change.branch}:${change.path}`;
    const snapshot = this.snapshotOf(change.branch, 'writeFile');
    this.assertToken(snapshot, change.path, change.expected, 'writeFile', target);

    const next = new Map(snapshot);
    next.set(change.path, Uint8Array.from(change.content));
    this.commit(change.branch, next);
  }

  async deleteFile(change: FileDeletion): Promise<void> {
    const target = `${change.branch}:${change.path}`;
    const snapshot = this.snapshotOf(change.branch, 'deleteFile');
    if (change.expected.kind === 'new') {
      throw new ConflictError(`Cannot delete ${change.path}: no blob on ${this.mainBranch}`, 'deleteFile', target);
    }
    this.assertToken(snapshot, change.path, change.expected, 'deleteFile', target);

    const next = new Map(snapshot);
    next.delete(change.path);
    this.commit(change.branch, next);
  }

  async createPullRequest(draft: PullRequestDraft): Promise<PullRequestRef> {
    for (const branch of [draft.head, draft.base]) {
      if (!this.state.branches.has(branch)) {
        throw new ConflictError(`Validation failed: unknown branch ${branch}`, 'createPullRequest', draft.head);
      }
    }
    const number = this.addPullRequest({
      head: draft.head,
      base: draft.base,
      title: draft.title,
      body: draft.body,
    });
    return { number, url: `${this.baseUrl}/pull/${number}` };
  }

  async setLabels(pullRequestNumber: number, labels: string[]): Promise<void> {
    this.findPullRequest(pullRequestNumber, 'setLabels').labels = [...labels];
  }

  /** Newest first, like the GitHub pulls listing. */
  async *listPullRequests(): AsyncGenerator<PullRequestSummary> {
    const newestFirst = [...this.state.pullRequests].reverse();
    for (const pr of newestFirst) {
      yield {
        number: pr.number,
        body: pr.body,
        htmlUrl: pr.url,
        createdAt: pr.createdAt.toISOString(),
        state: pr.state,
        mergedAt: pr.mergedAt ? pr.mergedAt.toISOString() : null,
      };
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════

  private initialState(): MemoryHostingState {
    const root = this.commitSha(0);
    return {
      commits: new Map<string, Snapshot>([[root, new Map()]]),
      branches: new Map([[this.mainBranch, root]]),
      pullRequests: [],
      commitCount: 0,
    };
  }

  private commitSha(count: number): string {
    return createHash('sha1').update(`commit ${count}`).digest('hex');
  }

  private commit(branch: string, snapshot: Snapshot): string {
    this.state.commitCount += 1;
    const sha = this.commitSha(this.state.commitCount);
    this.state.commits.set(sha, snapshot);
    this.state.branches.set(branch, sha);
    return sha;
  }

  private tipOf(branch: string, operation: string): string {
    const tip = this.state.branches.get(branch);
    if (tip === undefined) {
      throw new HostingPlatformError(`Not found: branch ${branch}`, 'NOT_FOUND', operation, branch, 404);
    }
    return tip;
  }

  /** Accepts a branch name or a commit SHA. */
  private snapshotOf(ref: string, operation: string): Snapshot {
    const sha = this.state.commits.has(ref) ? ref : this.tipOf(ref, operation);
    const snapshot = this.state.commits.get(sha);
    if (snapshot === undefined) {
      throw new HostingPlatformError(`Not found: commit ${sha}`, 'NOT_FOUND', operation, ref, 404);
    }
    return snapshot;
  }

  private assertToken(
    snapshot: Snapshot,
    path: string,
    expected: ContentToken,
    operation: string,
    target: string,
  ): void {
    const current = snapshot.get(path);
    const currentSha = current === undefined ? null : blobSha(current);

    if (expected.kind === 'new' && currentSha !== null) {
      throw new ConflictError(`Validation failed: ${path} already exists`, operation, target, 422);
    }
    if (expected.kind === 'existing' && currentSha !== expected.sha) {
      throw new ConflictError(`Conflict: ${path} does not match ${expected.sha}`, operation, target, 409);
    }
  }

  private findPullRequest(number: number, operation: string): MemoryPullRequest {
    const pr = this.state.pullRequests.find(candidate => candidate.number === number);
    if (!pr) {
      throw new HostingPlatformError(`Not found: pull request #${number}`, 'NOT_FOUND', operation, `#${number}`, 404);
    }
    return pr;
  }
}
