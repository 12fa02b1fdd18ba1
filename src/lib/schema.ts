/**
 * JSON Schema validation utilities using Ajv.
 */

import { Ajv } from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  /** Whether the data is valid */
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** Validation error messages if invalid */
  errors: string[];
}

/** Bundled config schema, resolved beside the package root from src/ or dist/ */
export const CONFIG_SCHEMA_PATH = fileURLToPath(
  new URL('../../schemas/hostprep.config.schema.json', import.meta.url)
);

const ajv = new Ajv({ strict: true, allErrors: true });

// Cache for compiled schemas, keyed by $id
const schemaCache = new Map<string, ValidateFunction>();

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('schema root is not an object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compile(schema: object): ValidateFunction {
  const key = '$id' in schema && typeof schema.$id === 'string' ? schema.$id : JSON.stringify(schema);
  const cached = schemaCache.get(key);
  if (cached) {
    return cached;
  }
  const validate = ajv.compile(schema);
  schemaCache.set(key, validate);
  return validate;
}

/**
 * Validates data against a JSON schema.
 *
 * `T` is the type the schema describes; the caller keeps the two in step.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const validate = compile(schema);

  if (validate(data)) {
    return { valid: true, data: data as T, errors: [] };
  }

  const errors = (validate.errors ?? []).map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    const message = error.message || 'Validation error';
    return `${path ? `${path}: ` : ''}${message}`;
  });

  return { valid: false, data: null, errors };
}
