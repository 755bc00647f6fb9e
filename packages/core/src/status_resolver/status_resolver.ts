import type { SubmissionStatus } from '../change_descriptor/change_descriptor.types';

/**
 * Derives a submission's lifecycle state from a pull request's raw fields.
 *
 * `merged_at` is authoritative for closed pull requests: the `merged`
 * flag would cost one more request per pull request.
 */
export function resolveSubmissionStatus(
  state: string,
  mergedAt: string | Date | null | undefined,
): SubmissionStatus {
  if (state === 'open') {
    return 'Pending';
  }
  return mergedAt !== null && mergedAt !== undefined ? 'Merged' : 'Rejected';
}
