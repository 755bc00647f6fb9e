/**
 * In-memory implementations (no network required)
 *
 * Suitable for tests and local dry runs.
 */

// HostingPlatform
export { MemoryHostingPlatform, blobSha } from './hosting_platform/memory';
export type {
  MemoryHostingPlatformOptions,
  MemoryPullRequest,
  MemoryPullRequestSeed,
} from './hosting_platform/memory';
