/**
 * Types for the submissions command.
 */

import type { BaseCommandOptions } from '../../interfaces/command';

/** Options for `catalog-submissions submissions list` */
export interface SubmissionsListOptions extends BaseCommandOptions {
  /** Only submissions of this user */
  user?: string;
  /** pending, merged or rejected */
  status?: string;
}
