/**
 * Error taxonomy for the submission workflow.
 *
 * Everything thrown by core extends SubmissionError. Only
 * DescriptorDecodeError is ever recovered internally (by the lister).
 */

/**
 * Base error class for all submission errors
 */
export class SubmissionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SubmissionError';
    Object.setPrototypeOf(this, SubmissionError.prototype);
  }
}

/**
 * Caller-supplied identifiers are malformed
 */
export class InvalidInputError extends SubmissionError {
  public readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'InvalidInputError';
    this.field = field;
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

/**
 * A pull request body is not a change descriptor payload
 */
export class DescriptorDecodeError extends SubmissionError {
  constructor(reason: string) {
    super(`Cannot decode change descriptor: ${reason}`);
    this.name = 'DescriptorDecodeError';
    Object.setPrototypeOf(this, DescriptorDecodeError.prototype);
  }
}

/**
 * Every candidate branch name up to the retry bound was already taken
 */
export class BranchAllocationExhaustedError extends SubmissionError {
  public readonly baseName: string;
  public readonly attempts: number;

  constructor(baseName: string, attempts: number) {
    super(`No free branch name for "${baseName}" after ${attempts} attempts`);
    this.name = 'BranchAllocationExhaustedError';
    this.baseName = baseName;
    this.attempts = attempts;
    Object.setPrototypeOf(this, BranchAllocationExhaustedError.prototype);
  }
}

/**
 * Raised by a hosting platform when a branch name is taken
 */
export class BranchAlreadyExistsError extends SubmissionError {
  public readonly branchName: string;

  constructor(branchName: string) {
    super(`Branch already exists: ${branchName}`);
    this.name = 'BranchAlreadyExistsError';
    this.branchName = branchName;
    Object.setPrototypeOf(this, BranchAlreadyExistsError.prototype);
  }
}

/**
 * Semantic codes abstracting hosting platform HTTP statuses.
 */
export type HostingPlatformErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'BAD_REQUEST';

/**
 * Failure reported by (or while talking to) the hosting platform
 */
export class HostingPlatformError extends SubmissionError {
  constructor(
    message: string,
    public readonly code: HostingPlatformErrorCode,
    /** Platform operation that failed, e.g. "createBranch" */
    public readonly operation: string,
    /** Branch, path or pull request the operation targeted */
    public readonly target: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'HostingPlatformError';
    Object.setPrototypeOf(this, HostingPlatformError.prototype);
  }
}

/**
 * An optimistic-concurrency write or delete lost against a concurrent change
 */
export class ConflictError extends HostingPlatformError {
  constructor(message: string, operation: string, target: string, statusCode?: number) {
    super(message, 'CONFLICT', operation, target, statusCode);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * Network, availability or timeout failure; the whole submission may be retried
 */
export class TransientPlatformError extends HostingPlatformError {
  constructor(
    message: string,
    code: 'SERVER_ERROR' | 'NETWORK_ERROR' | 'TIMEOUT',
    operation: string,
    target: string,
    statusCode?: number,
  ) {
    super(message, code, operation, target, statusCode);
    this.name = 'TransientPlatformError';
    Object.setPrototypeOf(this, TransientPlatformError.prototype);
  }
}

/**
 * Configuration is missing or invalid
 */
export class ConfigError extends SubmissionError {
  public readonly fields: string[];

  constructor(fields: string[], details: string) {
    super(`Invalid configuration: ${details}`);
    this.name = 'ConfigError';
    this.fields = fields;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
