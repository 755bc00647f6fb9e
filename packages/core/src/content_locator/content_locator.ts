/**
 * ContentLocator - current blob identity of a path on main
 *
 * @module content_locator
 */

import type { ContentToken, IHostingPlatform } from '../hosting_platform';
import type { ContentLocatorDependencies, IContentLocator } from './content_locator.types';

/**
 * Splits `a/b/c.json` into `['a/b', 'c.json']`; a single segment has the
 * repository root ('') as parent.
 */
export function splitPath(path: string): [parent: string, name: string] {
  const slash = path.lastIndexOf('/');
  if (slash === -1) {
    return ['', path];
  }
  return [path.slice(0, slash), path.slice(slash + 1)];
}

export class ContentLocator implements IContentLocator {
  private readonly platform: IHostingPlatform;

  constructor(deps: ContentLocatorDependencies) {
    this.platform = deps.platform;
  }

  async locate(path: string): Promise<ContentToken> {
    const [parent, name] = splitPath(path);
    const listing = await this.platform.getDirectoryListing(this.platform.mainBranch, parent);
    const entry = listing?.find(candidate => candidate.name === name);

    return entry ? { kind: 'existing', sha: entry.sha } : { kind: 'new' };
  }
}
