export { ContentLocator, splitPath } from './content_locator';
export type { ContentLocatorDependencies, IContentLocator } from './content_locator.types';
