import type { JSONSchemaType } from 'ajv';
import { CHANGE_KINDS } from './change_descriptor.types';
import type { ChangeDescriptorPayload } from './change_descriptor.types';

/**
 * Unknown extra keys are accepted so newer writers stay readable.
 */
export const changeDescriptorPayloadSchema: JSONSchemaType<ChangeDescriptorPayload> = {
  type: 'object',
  properties: {
    filename: { type: 'string' },
    item_type: { type: 'string' },
    change_type: { type: 'string', enum: CHANGE_KINDS },
    user: { type: 'string' },
    data_owner: { type: 'boolean' },
  },
  required: ['filename', 'item_type', 'change_type', 'user', 'data_owner'],
  additionalProperties: true,
};
