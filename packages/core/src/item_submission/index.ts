export {
  ItemSubmissionService,
  DATA_OWNER_LABEL,
  itemPath,
  validateUser,
  validateFilename,
} from './item_submission';
export type {
  IItemSubmissionService,
  ItemRef,
  ItemWrite,
  ItemSubmissionResult,
  ItemSubmissionDependencies,
} from './item_submission.types';
