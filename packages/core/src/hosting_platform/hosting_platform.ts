import type {
  DirectoryEntry,
  FileDeletion,
  FileWrite,
  PullRequestDraft,
  PullRequestRef,
  PullRequestSummary,
} from './hosting_platform.types';

/**
 * IHostingPlatform - the repository-hosting operations the submission
 * workflow consumes. The platform owns branches, commits and pull requests;
 * implementations only translate calls and errors.
 */
export interface IHostingPlatform {
  /** Name of the branch submissions target */
  readonly mainBranch: string;

  /** Commit SHA at the tip of the main branch */
  getMainBranchTip(): Promise<string>;

  /**
   * Creates `name` pointing at `fromCommit`. Atomic on the platform.
   * @throws BranchAlreadyExistsError when the name is taken
   */
  createBranch(name: string, fromCommit: string): Promise<void>;

  /**
   * Lists a directory at `ref` ("" is the repository root).
   * Resolves to null when the directory does not exist.
   */
  getDirectoryListing(ref: string, path: string): Promise<DirectoryEntry[] | null>;

  /** @throws ConflictError when `expected` does not match the current blob */
  writeFile(change: FileWrite): Promise<void>;

  /** @throws ConflictError when `expected` does not match the current blob */
  deleteFile(change: FileDeletion): Promise<void>;

  createPullRequest(draft: PullRequestDraft): Promise<PullRequestRef>;

  /** Replaces the labels of a pull request */
  setLabels(pullRequestNumber: number, labels: string[]): Promise<void>;

  /** Every pull request, open and closed, fetched page by page as iterated */
  listPullRequests(): AsyncIterable<PullRequestSummary>;
}
