/**
 * GitHub implementation of the hosting platform port
 *
 * @module hosting_platform/github
 */

export { GitHubHostingPlatform } from './github_hosting_platform';
export { createOctokit } from './octokit_factory';
export { isOctokitRequestError, mapOctokitError } from './octokit_errors';
export type {
  GitHubHostingPlatformOptions,
  OctokitFactoryOptions,
} from './github_hosting_platform.types';
