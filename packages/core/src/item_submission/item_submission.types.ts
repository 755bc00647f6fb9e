/**
 * Types for ItemSubmissionService.
 *
 * @module item_submission
 */

import type { ChangeDescriptor } from '../change_descriptor';
import type {
  ISubmissionLister,
  ISubmissionOrchestrator,
  SubmissionReceipt,
} from '../submission';
import type { Logger } from '../logger';

/** Identifies one catalog item of a user. */
export type ItemRef = {
  user: string;
  itemType: string;
  /** Path below the user's directory, e.g. 'x.json' or 'drafts/x.json' */
  filename: string;
  isDataOwner: boolean;
};

export type ItemWrite = ItemRef & {
  /** File content; strings are written as UTF-8 */
  content: Uint8Array | string;
};

export type ItemSubmissionResult = {
  /** Descriptor embedded in the pull request */
  descriptor: ChangeDescriptor;
  receipt: SubmissionReceipt;
};

export type ItemSubmissionDependencies = {
  orchestrator: ISubmissionOrchestrator;
  lister: ISubmissionLister;
  logger?: Logger;
};

export interface IItemSubmissionService {
  addItem(request: ItemWrite): Promise<ItemSubmissionResult>;
  updateItem(request: ItemWrite): Promise<ItemSubmissionResult>;
  deleteItem(request: ItemRef): Promise<ItemSubmissionResult>;
  listSubmissions(user?: string): AsyncGenerator<ChangeDescriptor>;
}
