/**
 * Types shared by every IHostingPlatform implementation.
 */

/**
 * Optimistic-concurrency token for a path on the main branch.
 * `new` means the path has no blob yet; `existing` carries the blob SHA the
 * write or delete must replace.
 */
export type ContentToken =
  | { kind: 'new' }
  | { kind: 'existing'; sha: string };

/** One entry of a directory listing. */
export type DirectoryEntry = {
  /** Entry name (final path segment) */
  name: string;
  /** Content identity (blob or tree SHA) */
  sha: string;
  type: 'file' | 'dir' | 'other';
};

export type FileWrite = {
  branch: string;
  path: string;
  content: Uint8Array;
  expected: ContentToken;
  message: string;
};

export type FileDeletion = {
  branch: string;
  path: string;
  expected: ContentToken;
  message: string;
};

export type PullRequestDraft = {
  /** Source branch */
  head: string;
  /** Target branch */
  base: string;
  title: string;
  body: string;
};

export type PullRequestRef = {
  number: number;
  /** HTML URL of the pull request */
  url: string;
};

/** Raw pull request fields the lister needs. */
export type PullRequestSummary = {
  number: number;
  body: string | null;
  htmlUrl: string;
  /** ISO 8601 */
  createdAt: string;
  /** Raw platform state, e.g. "open" or "closed" */
  state: string;
  /** ISO 8601, null unless merged */
  mergedAt: string | null;
};
