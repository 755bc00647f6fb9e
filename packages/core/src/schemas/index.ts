export { SchemaValidationCache, toFieldErrors } from './schema_cache';
export type { SchemaFieldError } from './schema_cache';
