/**
 * JSON Schema validation utilities using Ajv.
 */

import AjvDefault from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';

/**
 * Result of schema validation.
 */
export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; data: null; errors: string[] };

// Type assertion needed due to NodeNext module resolution of Ajv's CommonJS default export
const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
  compile: <T>(schema: object) => ValidateFunction<T>;
};

let ajv: InstanceType<typeof Ajv> | null = null;

// Cache for compiled schemas
const schemaCache = new Map<string, ValidateFunction<unknown>>();

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string | URL): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('schema root is not an object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${String(schemaPath)}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    return `${path ? `${path}: ` : ''}${error.message ?? 'Validation error'}`;
  });
}

/**
 * Validates data against a JSON schema, caching compiled schemas by `$id`.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const instance = (ajv ??= new Ajv({ strict: true, allErrors: true }));

  const schemaId = '$id' in schema && typeof schema.$id === 'string' ? schema.$id : JSON.stringify(schema);
  let validate = schemaCache.get(schemaId);
  if (!validate) {
    validate = instance.compile<unknown>(schema);
    schemaCache.set(schemaId, validate);
  }

  if (validate(data)) {
    return { valid: true, data: data as T, errors: [] };
  }

  return { valid: false, data: null, errors: formatSchemaErrors(validate.errors) };
}
