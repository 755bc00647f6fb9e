import { Octokit } from '@octokit/rest';
import type { OctokitFactoryOptions } from './github_hosting_platform.types';

/**
 * Builds an authenticated Octokit whose every request, paginated ones
 * included, aborts after `requestTimeoutMs`.
 */
export function createOctokit(options: OctokitFactoryOptions): Octokit {
  const octokit = new Octokit({
    auth: options.token,
    baseUrl: options.apiBaseUrl ?? 'https://api.github.com',
    request: options.fetch ? { fetch: options.fetch } : {},
  });

  octokit.hook.before('request', (requestOptions) => {
    requestOptions.request = {
      ...requestOptions.request,
      signal: AbortSignal.timeout(options.requestTimeoutMs),
    };
  });

  return octokit;
}
