import type { JSONSchemaType } from 'ajv';
import type { RawSubmissionConfig } from './config_manager.types';

export const submissionConfigSchema: JSONSchemaType<RawSubmissionConfig> = {
  type: 'object',
  properties: {
    token: { type: 'string', minLength: 1 },
    repoId: { type: 'string', pattern: '^[A-Za-z0-9_.-]+/[A-Za-z0-9_.-]+$' },
    mainBranch: { type: 'string', minLength: 1 },
    apiBaseUrl: { type: 'string', format: 'uri' },
    requestTimeoutMs: { type: 'integer', minimum: 1 },
    branchAllocationMaxRetries: { type: 'integer', minimum: 0, maximum: 100 },
  },
  required: [
    'token',
    'repoId',
    'mainBranch',
    'apiBaseUrl',
    'requestTimeoutMs',
    'branchAllocationMaxRetries',
  ],
  additionalProperties: false,
};
