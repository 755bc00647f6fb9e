/**
 * Octokit error translation shared by the GitHub adapters.
 *
 * @module hosting_platform/github/octokit_errors
 */

import {
  ConflictError,
  HostingPlatformError,
  TransientPlatformError,
} from '../../errors';

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 * Avoids a runtime import of @octokit/request-error.
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

function isTimeout(error: Error): boolean {
  return error.name === 'TimeoutError'
    || error.name === 'AbortError'
    || /aborted due to timeout/i.test(error.message);
}

/**
 * Maps Octokit RequestError (and unknown errors) to the submission error taxonomy.
 *
 * @param operation - platform operation, e.g. "writeFile"
 * @param target - branch, path or pull request the operation targeted
 */
export function mapOctokitError(
  error: unknown,
  operation: string,
  target: string,
): HostingPlatformError {
  const context = `${operation} ${target}`;

  if (isOctokitRequestError(error)) {
    const status = error.status;

    if (isTimeout(error)) {
      return new TransientPlatformError(`Timed out: ${context}`, 'TIMEOUT', operation, target, status);
    }
    if (status === 401 || status === 403) {
      return new HostingPlatformError(
        `Permission denied: ${context}`,
        'PERMISSION_DENIED',
        operation,
        target,
        status,
      );
    }
    if (status === 404) {
      return new HostingPlatformError(`Not found: ${context}`, 'NOT_FOUND', operation, target, status);
    }
    if (status === 409) {
      return new ConflictError(`Conflict: ${context}`, operation, target, status);
    }
    if (status === 422) {
      return new ConflictError(`Validation failed: ${context}`, operation, target, status);
    }
    if (status >= 500) {
      return new TransientPlatformError(
        `Server error (${status}): ${context}`,
        'SERVER_ERROR',
        operation,
        target,
        status,
      );
    }

    return new HostingPlatformError(
      `GitHub API error (${status}): ${context}`,
      'BAD_REQUEST',
      operation,
      target,
      status,
    );
  }

  if (error instanceof Error && isTimeout(error)) {
    return new TransientPlatformError(`Timed out: ${context}`, 'TIMEOUT', operation, target);
  }

  // Network / unknown errors
  const message = error instanceof Error ? error.message : String(error);
  return new TransientPlatformError(
    `Network error: ${message} (${context})`,
    'NETWORK_ERROR',
    operation,
    target,
  );
}
