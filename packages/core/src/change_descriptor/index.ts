/**
 * Change descriptors and their pull-request body payload
 *
 * @module change_descriptor
 */

export {
  createChangeDescriptor,
  toChangeDescriptorPayload,
  encodeChangeDescriptor,
  decodeChangeDescriptor,
} from './change_descriptor';

export { changeDescriptorPayloadSchema } from './change_descriptor.schema';

export { CHANGE_KINDS, SUBMISSION_STATUSES } from './change_descriptor.types';

export type {
  ChangeKind,
  SubmissionStatus,
  ChangeDescriptor,
  ChangeDescriptorInput,
  ChangeDescriptorPayload,
  PullRequestContext,
} from './change_descriptor.types';
