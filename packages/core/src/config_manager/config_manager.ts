/**
 * Environment configuration for the submission workflow.
 *
 * Reads process-style environment variables, applies defaults and validates
 * the result with ajv. Loading `.env` files is left to the entry point.
 *
 * @module config_manager
 */

import type { RawSubmissionConfig, SubmissionConfig } from './config_manager.types';
import { CONFIG_DEFAULTS, CONFIG_ENV_VARS } from './config_manager.types';
import { submissionConfigSchema } from './config_manager.schema';
import { SchemaValidationCache, toFieldErrors } from '../schemas';
import { ConfigError } from '../errors';

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Integers become numbers; anything else is passed through so the schema
 * reports it.
 */
function readInteger(env: Env, name: string): number | string | undefined {
  const value = readString(env, name);
  return value !== undefined && /^-?\d+$/.test(value) ? Number(value) : value;
}

function isConfigField(field: string): field is keyof RawSubmissionConfig {
  return field in CONFIG_ENV_VARS;
}

/**
 * Builds the configuration from `env`.
 *
 * @throws ConfigError naming every missing or invalid variable
 */
export function loadSubmissionConfig(env: Env = process.env): SubmissionConfig {
  const candidate: Record<string, unknown> = {
    token: readString(env, CONFIG_ENV_VARS.token),
    repoId: readString(env, CONFIG_ENV_VARS.repoId),
    mainBranch: readString(env, CONFIG_ENV_VARS.mainBranch) ?? CONFIG_DEFAULTS.mainBranch,
    apiBaseUrl: readString(env, CONFIG_ENV_VARS.apiBaseUrl) ?? CONFIG_DEFAULTS.apiBaseUrl,
    requestTimeoutMs: readInteger(env, CONFIG_ENV_VARS.requestTimeoutMs)
      ?? CONFIG_DEFAULTS.requestTimeoutMs,
    branchAllocationMaxRetries: readInteger(env, CONFIG_ENV_VARS.branchAllocationMaxRetries)
      ?? CONFIG_DEFAULTS.branchAllocationMaxRetries,
  };

  const validate = SchemaValidationCache.getValidatorFromSchema<RawSubmissionConfig>(submissionConfigSchema);
  if (!validate(candidate)) {
    const errors = toFieldErrors(validate.errors).map(error => ({
      variable: isConfigField(error.field) ? CONFIG_ENV_VARS[error.field] : error.field,
      message: error.message,
    }));
    const fields = [...new Set(errors.map(error => error.variable))];
    const details = errors.map(error => `${error.variable}: ${error.message}`).join('; ');
    throw new ConfigError(fields, details);
  }

  const [owner = '', repo = ''] = candidate.repoId.split('/');
  return {
    token: candidate.token,
    owner,
    repo,
    mainBranch: candidate.mainBranch,
    apiBaseUrl: candidate.apiBaseUrl,
    requestTimeoutMs: candidate.requestTimeoutMs,
    branchAllocationMaxRetries: candidate.branchAllocationMaxRetries,
  };
}
