/**
 * Types for change descriptors: the machine-readable record of what a
 * submission changes, embedded in its pull request description.
 */

/** Kind of mutation a submission proposes. Carried for audit and display. */
export type ChangeKind = 'Add' | 'Update' | 'Delete';

export const CHANGE_KINDS: readonly ChangeKind[] = ['Add', 'Update', 'Delete'];

/** Lifecycle state, always derived from the pull request, never stored. */
export type SubmissionStatus = 'Pending' | 'Merged' | 'Rejected';

export const SUBMISSION_STATUSES: readonly SubmissionStatus[] = ['Pending', 'Merged', 'Rejected'];

/**
 * One proposed mutation.
 *
 * `status`, `url` and `createdAt` belong to the pull request, not the change:
 * they are absent on a descriptor built before its pull request exists and
 * are never embedded in the payload.
 */
export type ChangeDescriptor = Readonly<{
  /** Repository path of the item file */
  filename: string;
  itemType: string;
  changeKind: ChangeKind;
  status?: SubmissionStatus;
  /** Pull request HTML URL */
  url?: string;
  /** Pull request creation time */
  createdAt?: Date;
  /** Requesting user */
  user: string;
  /** Whether the requester owns the data behind the item */
  isDataOwner: boolean;
}>;

/** Fields the caller chooses when building a descriptor locally. */
export type ChangeDescriptorInput = {
  filename: string;
  itemType: string;
  changeKind: ChangeKind;
  user: string;
  isDataOwner: boolean;
};

/**
 * Wire form embedded in the pull request body.
 * Key names are part of the contract with already-open pull requests.
 */
export type ChangeDescriptorPayload = {
  filename: string;
  item_type: string;
  change_type: ChangeKind;
  user: string;
  data_owner: boolean;
};

/** Pull request properties merged into a decoded descriptor. */
export type PullRequestContext = {
  url: string;
  status: SubmissionStatus;
  createdAt: Date | string;
};
