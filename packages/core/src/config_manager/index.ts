export { loadSubmissionConfig } from './config_manager';
export { submissionConfigSchema } from './config_manager.schema';
export { CONFIG_ENV_VARS, CONFIG_DEFAULTS } from './config_manager.types';
export type { SubmissionConfig, RawSubmissionConfig } from './config_manager.types';
