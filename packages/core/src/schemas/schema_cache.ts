import Ajv from "ajv";
import type { ErrorObject, JSONSchemaType, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

/**
 * Field-level validation failure, flattened from ajv's ErrorObject.
 */
export interface SchemaFieldError {
  field: string;
  message: string;
}

/**
 * Singleton cache for compiled ajv validators.
 * Schemas are keyed by their JSON text, so equal schema objects share one validator.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object
   * @returns Compiled ajv validator function
   */
  static getValidatorFromSchema<T = unknown>(schema: SchemaObject | JSONSchemaType<T>): ValidateFunction<T> {
    const schemaKey = JSON.stringify(schema);

    const cached = this.schemaValidators.get(schemaKey);
    if (cached) {
      return cached as ValidateFunction<T>;
    }

    const validator = this.getAjv().compile<T>(schema);
    this.schemaValidators.set(schemaKey, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemaValidators.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number } {
    return {
      cachedSchemas: this.schemaValidators.size,
    };
  }

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }
}

/**
 * Flattens ajv errors into `{ field, message }` pairs.
 * A missing required property is reported under its own name.
 */
export function toFieldErrors(errors: ErrorObject[] | null | undefined): SchemaFieldError[] {
  if (!errors) {
    return [];
  }

  return errors.map(error => {
    const missing: unknown = error.params['missingProperty'];
    const field = typeof missing === 'string'
      ? missing
      : error.instancePath.replace(/^\//, '') || 'root';
    return {
      field,
      message: error.message ?? 'Unknown validation error',
    };
  });
}
