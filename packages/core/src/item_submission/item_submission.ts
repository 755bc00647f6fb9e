/**
 * ItemSubmissionService - catalog items in, pull requests out
 *
 * An item of `user` lives at `<user>/<filename>` in the catalog repository.
 * Adding, updating and deleting it each open one pull request carrying the
 * change descriptor as body and the item type as label.
 *
 * @module item_submission
 */

import {
  createChangeDescriptor,
  encodeChangeDescriptor,
} from '../change_descriptor';
import type { ChangeDescriptor, ChangeKind } from '../change_descriptor';
import type { ISubmissionLister, ISubmissionOrchestrator, SubmissionRequest } from '../submission';
import { InvalidInputError } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { generateBranchBaseName } from '../utils/slug';
import type {
  IItemSubmissionService,
  ItemRef,
  ItemSubmissionDependencies,
  ItemSubmissionResult,
  ItemWrite,
} from './item_submission.types';

export const DATA_OWNER_LABEL = 'data-owner';

const USER_PATTERN = /^[A-Za-z0-9._-]+$/;

export function validateUser(user: string): void {
  if (!USER_PATTERN.test(user) || user === '.' || user === '..') {
    throw new InvalidInputError('user', `"${user}" must be a single path segment of letters, digits, '.', '_' or '-'`);
  }
}

export function validateFilename(filename: string): void {
  if (filename === '') {
    throw new InvalidInputError('filename', 'must not be empty');
  }
  if (filename.startsWith('/')) {
    throw new InvalidInputError('filename', `"${filename}" must be relative`);
  }
  const bad = filename.split('/').find(segment => segment === '' || segment === '.' || segment === '..');
  if (bad !== undefined) {
    throw new InvalidInputError('filename', `"${filename}" contains an empty, '.' or '..' segment`);
  }
}

/**
 * Repository path of an item: `<user>/<filename>`.
 */
export function itemPath(user: string, filename: string): string {
  validateUser(user);
  validateFilename(filename);
  return `${user}/${filename}`;
}

export class ItemSubmissionService implements IItemSubmissionService {
  private readonly orchestrator: ISubmissionOrchestrator;
  private readonly lister: ISubmissionLister;
  private readonly logger: Logger;

  constructor(deps: ItemSubmissionDependencies) {
    this.orchestrator = deps.orchestrator;
    this.lister = deps.lister;
    this.logger = deps.logger ?? createLogger('[ItemSubmission] ');
  }

  async addItem(request: ItemWrite): Promise<ItemSubmissionResult> {
    return this.submitWrite('Add', request);
  }

  async updateItem(request: ItemWrite): Promise<ItemSubmissionResult> {
    return this.submitWrite('Update', request);
  }

  async deleteItem(request: ItemRef): Promise<ItemSubmissionResult> {
    const descriptor = this.describe('Delete', request);
    return this.submit(descriptor, { delete: descriptor.filename });
  }

  listSubmissions(user?: string): AsyncGenerator<ChangeDescriptor> {
    if (user !== undefined) {
      validateUser(user);
    }
    return this.lister.listFor(user);
  }

  private async submitWrite(kind: 'Add' | 'Update', request: ItemWrite): Promise<ItemSubmissionResult> {
    const descriptor = this.describe(kind, request);
    const content = typeof request.content === 'string'
      ? Buffer.from(request.content, 'utf8')
      : request.content;
    return this.submit(descriptor, { create: { path: descriptor.filename, content } });
  }

  private describe(kind: ChangeKind, request: ItemRef): ChangeDescriptor {
    const path = itemPath(request.user, request.filename);
    if (request.itemType.trim() === '') {
      throw new InvalidInputError('itemType', 'must not be empty');
    }
    return createChangeDescriptor({
      filename: path,
      itemType: request.itemType,
      changeKind: kind,
      user: request.user,
      isDataOwner: request.isDataOwner,
    });
  }

  private async submit(
    descriptor: ChangeDescriptor,
    change: Pick<SubmissionRequest, 'create' | 'delete'>,
  ): Promise<ItemSubmissionResult> {
    const receipt = await this.orchestrator.submit({
      branchBaseName: generateBranchBaseName(descriptor.changeKind, descriptor.filename),
      title: `${descriptor.changeKind} ${descriptor.filename}`,
      body: encodeChangeDescriptor(descriptor),
      labels: [...new Set(
        descriptor.isDataOwner ? [descriptor.itemType, DATA_OWNER_LABEL] : [descriptor.itemType],
      )],
      ...change,
    });
    this.logger.info(
      `${descriptor.changeKind} ${descriptor.filename} submitted as pull request #${receipt.pullRequest.number}`,
    );
    return { descriptor, receipt };
  }
}
