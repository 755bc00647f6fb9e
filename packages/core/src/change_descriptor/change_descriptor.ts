/**
 * Change descriptor construction and payload codec.
 *
 * @module change_descriptor
 */

import type {
  ChangeDescriptor,
  ChangeDescriptorInput,
  ChangeDescriptorPayload,
  PullRequestContext,
} from './change_descriptor.types';
import { changeDescriptorPayloadSchema } from './change_descriptor.schema';
import { SchemaValidationCache, toFieldErrors } from '../schemas';
import { DescriptorDecodeError } from '../errors';

/**
 * Builds a frozen descriptor for a change whose pull request does not exist yet.
 */
export function createChangeDescriptor(input: ChangeDescriptorInput): ChangeDescriptor {
  return Object.freeze({
    filename: input.filename,
    itemType: input.itemType,
    changeKind: input.changeKind,
    user: input.user,
    isDataOwner: input.isDataOwner,
  });
}

/**
 * Extracts the five embedded fields in wire form.
 */
export function toChangeDescriptorPayload(descriptor: ChangeDescriptor): ChangeDescriptorPayload {
  return {
    filename: descriptor.filename,
    item_type: descriptor.itemType,
    change_type: descriptor.changeKind,
    user: descriptor.user,
    data_owner: descriptor.isDataOwner,
  };
}

/**
 * Serializes a descriptor into a pull request body.
 */
export function encodeChangeDescriptor(descriptor: ChangeDescriptor): string {
  return JSON.stringify(toChangeDescriptorPayload(descriptor));
}

/**
 * Rebuilds a descriptor from a pull request body plus the pull request's own
 * url, status and creation time.
 *
 * @throws DescriptorDecodeError for any body that is not a well-formed payload.
 *   No other error kind escapes.
 */
export function decodeChangeDescriptor(
  body: string | null | undefined,
  context: PullRequestContext,
): ChangeDescriptor {
  if (body === null || body === undefined || body.trim() === '') {
    throw new DescriptorDecodeError('pull request body is empty');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DescriptorDecodeError(`body is not JSON (${message})`);
  }

  const validate = SchemaValidationCache.getValidatorFromSchema<ChangeDescriptorPayload>(
    changeDescriptorPayloadSchema,
  );

  if (!validate(parsed)) {
    const details = toFieldErrors(validate.errors)
      .map(e => `${e.field} ${e.message}`)
      .join('; ');
    throw new DescriptorDecodeError(details || 'payload does not match schema');
  }

  const createdAt = context.createdAt instanceof Date
    ? context.createdAt
    : new Date(context.createdAt);

  return Object.freeze({
    filename: parsed.filename,
    itemType: parsed.item_type,
    changeKind: parsed.change_type,
    status: context.status,
    url: context.url,
    createdAt,
    user: parsed.user,
    isDataOwner: parsed.data_owner,
  });
}
