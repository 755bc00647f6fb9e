/**
 * Types for environment configuration.
 *
 * @module config_manager
 */

/** Validated values, before the repository id is split. */
export type RawSubmissionConfig = {
  token: string;
  /** `owner/repo` */
  repoId: string;
  mainBranch: string;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  branchAllocationMaxRetries: number;
};

export type SubmissionConfig = {
  /** GitHub access token */
  token: string;
  owner: string;
  repo: string;
  /** Branch submissions target */
  mainBranch: string;
  /** GitHub REST API base URL */
  apiBaseUrl: string;
  /** Per-request timeout in milliseconds */
  requestTimeoutMs: number;
  /** Collisions tolerated by the branch allocator */
  branchAllocationMaxRetries: number;
};

/** Environment variable read for each config field. */
export const CONFIG_ENV_VARS: Readonly<Record<keyof RawSubmissionConfig, string>> = {
  token: 'GITHUB_TOKEN',
  repoId: 'GITHUB_REPO_ID',
  mainBranch: 'GITHUB_MAIN_BRANCH',
  apiBaseUrl: 'GITHUB_API_BASE_URL',
  requestTimeoutMs: 'GITHUB_REQUEST_TIMEOUT_MS',
  branchAllocationMaxRetries: 'BRANCH_ALLOCATION_MAX_RETRIES',
};

export const CONFIG_DEFAULTS = {
  mainBranch: 'main',
  apiBaseUrl: 'https://api.github.com',
  requestTimeoutMs: 10000,
  branchAllocationMaxRetries: 15,
} as const;
