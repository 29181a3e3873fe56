/**
 * JSON Schema Validator
 *
 * Validates tool arguments against their declared schema, coercing loose
 * model output ("3" for 3, "true" for true) and filling defaults.
 */

import type { JSONSchema, PropertySchema, ValidationResult, ValidationError } from '../types';

type Checked = { ok: true; value: unknown } | { ok: false; errors: ValidationError[] };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(path: string, message: string, code: string): Checked {
  return { ok: false, errors: [{ path, message, code }] };
}

/**
 * Validate and coerce parameters according to JSON Schema
 */
export function validateParameters(
  params: unknown,
  schema: JSONSchema
): ValidationResult {
  if (!isPlainObject(params)) {
    return {
      valid: false,
      errors: [{ path: 'params', message: 'Parameters must be an object', code: 'INVALID_TYPE' }]
    };
  }

  const checked = checkProperties(params, schema.properties, schema.required, schema.additionalProperties, '');
  if (!checked.ok) {
    return { valid: false, errors: checked.errors };
  }
  return { valid: true, coerced: isPlainObject(checked.value) ? checked.value : {} };
}

/**
 * Format validation errors as one line for the model
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map(e => `${e.path}: ${e.message}`).join('; ');
}

// ============================================================================
// Objects
// ============================================================================

function checkProperties(
  input: Record<string, unknown>,
  properties: Record<string, PropertySchema>,
  required: string[] = [],
  additionalProperties: boolean | undefined,
  prefix: string
): Checked {
  const errors: ValidationError[] = [];
  const coerced: Record<string, unknown> = {};
  const at = (key: string) => (prefix ? `${prefix}.${key}` : key);

  for (const name of required) {
    if (input[name] === undefined) {
      errors.push({ path: at(name), message: `Missing required parameter: ${name}`, code: 'REQUIRED_FIELD' });
    }
  }

  for (const [key, propSchema] of Object.entries(properties)) {
    const value = input[key];
    if (value === undefined) {
      if (propSchema.default !== undefined) {
        coerced[key] = propSchema.default;
      }
      continue;
    }

    const result = checkValue(value, propSchema, at(key));
    if (result.ok) {
      coerced[key] = result.value;
    } else {
      errors.push(...result.errors);
    }
  }

  for (const key of Object.keys(input)) {
    if (key in properties) continue;
    if (additionalProperties === false) {
      errors.push({ path: at(key), message: `Additional property not allowed: ${key}`, code: 'ADDITIONAL_PROPERTY' });
    } else {
      coerced[key] = input[key];
    }
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: coerced };
}

// ============================================================================
// Values
// ============================================================================

function checkValue(value: unknown, schema: PropertySchema, path: string): Checked {
  if (value === null) {
    return schema.nullable
      ? { ok: true, value: null }
      : fail(path, 'Value cannot be null', 'NULL_NOT_ALLOWED');
  }

  switch (schema.type) {
    case 'string':
      return checkString(value, schema, path);
    case 'number':
    case 'integer':
      return checkNumber(value, schema, path);
    case 'boolean':
      return checkBoolean(value, path);
    case 'array':
      return checkArray(value, schema, path);
    case 'object':
      return isPlainObject(value)
        ? checkProperties(value, schema.properties ?? {}, schema.required, undefined, path)
        : fail(path, 'Value must be an object', 'INVALID_TYPE');
  }
}

function checkString(value: unknown, schema: PropertySchema, path: string): Checked {
  let str: string;
  if (typeof value === 'string') {
    str = value;
  } else if (typeof value === 'number' || typeof value === 'boolean') {
    str = String(value);
  } else {
    return fail(path, 'Value must be a string', 'INVALID_TYPE');
  }

  if (schema.enum && !schema.enum.includes(str)) {
    return fail(path, `Value must be one of: ${schema.enum.join(', ')}`, 'ENUM_MISMATCH');
  }
  if (schema.minLength !== undefined && str.length < schema.minLength) {
    return fail(path, `String length must be at least ${schema.minLength}`, 'TOO_SHORT');
  }
  return { ok: true, value: str };
}

function checkNumber(value: unknown, schema: PropertySchema, path: string): Checked {
  let num: number;
  if (typeof value === 'number') {
    num = value;
  } else if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) {
    num = Number(value);
  } else {
    return fail(path, 'Value must be a number', 'INVALID_TYPE');
  }

  if (schema.type === 'integer' && !Number.isInteger(num)) {
    return fail(path, 'Value must be an integer', 'NOT_INTEGER');
  }
  if (schema.minimum !== undefined && num < schema.minimum) {
    return fail(path, `Value must be at least ${schema.minimum}`, 'TOO_SMALL');
  }
  return { ok: true, value: num };
}

function checkBoolean(value: unknown, path: string): Checked {
  if (typeof value === 'boolean') return { ok: true, value };
  if (value === 'true') return { ok: true, value: true };
  if (value === 'false') return { ok: true, value: false };
  return fail(path, 'Value must be a boolean', 'INVALID_TYPE');
}

function checkArray(value: unknown, schema: PropertySchema, path: string): Checked {
  if (!Array.isArray(value)) {
    return fail(path, 'Value must be an array', 'INVALID_TYPE');
  }
  const itemSchema = schema.items;
  if (!itemSchema) {
    return { ok: true, value: [...value] };
  }

  const errors: ValidationError[] = [];
  const items: unknown[] = [];
  value.forEach((item: unknown, i: number) => {
    const result = checkValue(item, itemSchema, `${path}[${i}]`);
    if (result.ok) {
      items.push(result.value);
    } else {
      errors.push(...result.errors);
    }
  });

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: items };
}
