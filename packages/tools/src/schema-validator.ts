import type { JSONSchema } from '@toolgate/core';
import { isRecord } from '@toolgate/core';

/** A single validation error with location and description. */
export interface ArgumentError {
  path: string;
  message: string;
  expected?: string;
}

/** Result of validating tool arguments against a JSON Schema. */
export interface ArgumentValidationResult {
  valid: boolean;
  errors: ArgumentError[];
}

/** Known JSON Schema type strings. */
type SchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';

const SCHEMA_TYPES: readonly string[] = ['string', 'number', 'integer', 'boolean', 'object', 'array'];

function isSchemaType(value: unknown): value is SchemaType {
  return typeof value === 'string' && SCHEMA_TYPES.includes(value);
}

function readRequired(schema: JSONSchema): string[] {
  const required = schema['required'];
  return Array.isArray(required) ? required.filter((k): k is string => typeof k === 'string') : [];
}

function readProperties(schema: JSONSchema): Record<string, Record<string, unknown>> {
  const properties = schema['properties'];
  if (!isRecord(properties)) return {};
  const out: Record<string, Record<string, unknown>> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (isRecord(value)) out[key] = value;
  }
  return out;
}

/**
 * Lightweight JSON Schema validator for tool arguments.
 * Checks required fields, basic type constraints and `enum` values from the
 * schema's `properties` and `required` declarations.
 */
export function validateToolArgs(
  args: Record<string, unknown>,
  schema: JSONSchema,
): ArgumentValidationResult {
  const errors: ArgumentError[] = [];

  for (const key of readRequired(schema)) {
    if (!(key in args) || args[key] === undefined) {
      errors.push({
        path: key,
        message: `Missing required field: ${key}`,
      });
    }
  }

  const properties = readProperties(schema);
  for (const [key, value] of Object.entries(args)) {
    const propSchema = properties[key];
    if (!propSchema) continue;
    if (value === null || value === undefined) continue;

    const expectedType = propSchema['type'];
    if (isSchemaType(expectedType)) {
      const typeError = checkType(value, expectedType);
      if (typeError) {
        errors.push({ path: key, message: typeError, expected: expectedType });
        continue;
      }
    }

    const allowed = propSchema['enum'];
    if (Array.isArray(allowed) && !allowed.includes(value)) {
      errors.push({
        path: key,
        message: `Value ${JSON.stringify(value)} is not allowed`,
        expected: allowed.map((v) => JSON.stringify(v)).join(' | '),
      });
    }
  }

  return { valid: errors.length === 0, errors };
}

/** Check whether a value matches the expected JSON Schema type. */
function checkType(value: unknown, expected: SchemaType): string | null {
  switch (expected) {
    case 'string':
      if (typeof value !== 'string') {
        return `Expected string, got ${typeof value}`;
      }
      return null;

    case 'number':
      if (typeof value !== 'number') {
        return `Expected number, got ${typeof value}`;
      }
      return null;

    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        return `Expected integer, got ${typeof value === 'number' ? 'fraction' : typeof value}`;
      }
      return null;

    case 'boolean':
      if (typeof value !== 'boolean') {
        return `Expected boolean, got ${typeof value}`;
      }
      return null;

    case 'object':
      if (typeof value !== 'object' || Array.isArray(value)) {
        return `Expected object, got ${Array.isArray(value) ? 'array' : typeof value}`;
      }
      return null;

    case 'array':
      if (!Array.isArray(value)) {
        return `Expected array, got ${typeof value}`;
      }
      return null;
  }
}

/**
 * Format validation errors into a readable string the reasoning loop can
 * correct itself from. Includes the schema's properties and required fields
 * as hints.
 */
export function formatValidationErrors(errors: ArgumentError[], schema: JSONSchema): string {
  const lines: string[] = ['Argument validation failed:'];

  for (const err of errors) {
    const suffix = err.expected ? ` (expected: ${err.expected})` : '';
    lines.push(`  - ${err.path}: ${err.message}${suffix}`);
  }

  const properties = readProperties(schema);
  const required = readRequired(schema);

  if (Object.keys(properties).length > 0) {
    lines.push('');
    lines.push('Schema properties:');
    for (const [name, prop] of Object.entries(properties)) {
      const type = typeof prop['type'] === 'string' ? prop['type'] : 'unknown';
      const desc = typeof prop['description'] === 'string' ? prop['description'] : '';
      const reqMark = required.includes(name) ? ' (required)' : '';
      lines.push(`  - ${name}: ${type}${reqMark}${desc ? `: ${desc}` : ''}`);
    }
  }

  if (required.length > 0) {
    lines.push('');
    lines.push(`Required fields: ${required.join(', ')}`);
  }

  return lines.join('\n');
}
