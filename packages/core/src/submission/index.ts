/**
 * Submission workflow: orchestrate one change, list all changes
 *
 * @module submission
 */

export {
  SubmissionOrchestrator,
  addCommitMessage,
  deleteCommitMessage,
} from './submission_orchestrator';
export { SubmissionLister } from './submission_lister';

export type {
  SubmissionFile,
  SubmissionRequest,
  SubmissionReceipt,
  SubmissionOrchestratorDependencies,
  SubmissionListerDependencies,
  ISubmissionOrchestrator,
  ISubmissionLister,
} from './submission.types';
