/**
 * GitHub API implementations for @catalog-submissions/core/github
 *
 * Usage:
 *   import { createOctokit, GitHubHostingPlatform } from '@catalog-submissions/core/github';
 *
 * GitHubHostingPlatform receives an `Octokit` instance for testability and
 * shared auth, base URL and timeout config.
 */

// ==================== Re-exports: Octokit (types only) ====================

export type { Octokit, RestEndpointMethodTypes } from '@octokit/rest';

// ==================== Module Exports ====================

// HostingPlatform
export {
  GitHubHostingPlatform,
  createOctokit,
  isOctokitRequestError,
  mapOctokitError,
} from './hosting_platform/github';
export type {
  GitHubHostingPlatformOptions,
  OctokitFactoryOptions,
} from './hosting_platform/github';
