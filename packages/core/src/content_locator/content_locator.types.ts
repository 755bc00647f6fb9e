import type { ContentToken, IHostingPlatform } from '../hosting_platform';

export type ContentLocatorDependencies = {
  platform: IHostingPlatform;
};

export interface IContentLocator {
  /** Optimistic-concurrency token for `path` on the main branch. */
  locate(path: string): Promise<ContentToken>;
}
