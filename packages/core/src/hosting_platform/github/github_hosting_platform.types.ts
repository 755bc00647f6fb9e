/**
 * Types for GitHubHostingPlatform.
 */

import type { RestEndpointMethodTypes } from '@octokit/rest';

/**
 * Configuration for GitHubHostingPlatform.
 * Auth, base URL and timeouts live on the injected Octokit instance.
 */
export type GitHubHostingPlatformOptions = {
  /** GitHub repository owner (user or organization) */
  owner: string;
  /** GitHub repository name */
  repo: string;
  /** Branch submissions target (default: 'main') */
  mainBranch?: string;
};

/**
 * Options for createOctokit.
 */
export type OctokitFactoryOptions = {
  /** Access token with contents and pull request write permission */
  token: string;
  /** GitHub API base URL (default: 'https://api.github.com') */
  apiBaseUrl?: string;
  /** Per-request timeout in milliseconds */
  requestTimeoutMs: number;
  /** fetch implementation override (tests) */
  fetch?: typeof globalThis.fetch;
};

/** Item of `GET /repos/{owner}/{repo}/pulls`. */
export type GitHubPullRequestListItem =
  RestEndpointMethodTypes['pulls']['list']['response']['data'][number];
