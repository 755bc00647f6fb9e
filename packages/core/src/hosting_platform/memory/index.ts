export { MemoryHostingPlatform, blobSha } from './memory_hosting_platform';
export type {
  MemoryHostingPlatformOptions,
  MemoryPullRequest,
  MemoryPullRequestSeed,
} from './memory_hosting_platform.types';
