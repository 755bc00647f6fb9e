/**
 * Types for the item command.
 */

import type { BaseCommandOptions } from '../../interfaces/command';

/** Options for `catalog-submissions item delete` */
export interface ItemDeleteOptions extends BaseCommandOptions {
  /** Owner of the item (first path segment) */
  user: string;
  /** Item type, also used as pull request label */
  type: string;
  /** Requester owns the data behind the item */
  dataOwner?: boolean;
}

/** Options for `catalog-submissions item add|update` */
export interface ItemWriteOptions extends ItemDeleteOptions {
  /** Local file whose content is submitted */
  file: string;
}
