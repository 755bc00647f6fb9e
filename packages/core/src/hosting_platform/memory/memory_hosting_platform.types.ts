/**
 * Types for MemoryHostingPlatform.
 */

export type MemoryHostingPlatformOptions = {
  /** Branch submissions target (default: 'main') */
  mainBranch?: string;
  /** Prefix of pull request URLs (default: 'https://hosting.test/catalog') */
  baseUrl?: string;
  /** Clock used for pull request timestamps */
  now?: () => Date;
};

/** Pull request as stored by the in-memory platform. */
export type MemoryPullRequest = {
  number: number;
  head: string;
  base: string;
  title: string;
  body: string | null;
  labels: string[];
  state: 'open' | 'closed';
  createdAt: Date;
  mergedAt: Date | null;
  url: string;
};

/** Seed for a pull request created through the test helpers. */
export type MemoryPullRequestSeed = {
  body: string | null;
  head?: string;
  base?: string;
  title?: string;
  labels?: string[];
  state?: 'open' | 'closed';
  createdAt?: Date;
  mergedAt?: Date | null;
};
