/**
 * Hosting platform port
 *
 * Implementations:
 * - GitHubHostingPlatform (Octokit) from `@catalog-submissions/core/github`
 * - MemoryHostingPlatform from `@catalog-submissions/core/memory`
 *
 * @module hosting_platform
 */

export type { IHostingPlatform } from './hosting_platform';

export type {
  ContentToken,
  DirectoryEntry,
  FileWrite,
  FileDeletion,
  PullRequestDraft,
  PullRequestRef,
  PullRequestSummary,
} from './hosting_platform.types';
