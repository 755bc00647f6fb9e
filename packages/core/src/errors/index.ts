/**
 * Submission error taxonomy
 *
 * @module errors
 */

export {
  SubmissionError,
  InvalidInputError,
  DescriptorDecodeError,
  BranchAllocationExhaustedError,
  BranchAlreadyExistsError,
  HostingPlatformError,
  ConflictError,
  TransientPlatformError,
  ConfigError,
} from './errors';

export type { HostingPlatformErrorCode } from './errors';
