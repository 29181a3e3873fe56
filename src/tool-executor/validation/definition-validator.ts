/**
 * Tool Definition Validator
 *
 * Checks a ToolDefinition before it enters the registry.
 */

import type { ToolDefinition, PropertySchema, ValidationError } from '../types';

export interface DefinitionValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const NAME_PATTERN = /^[a-z][a-z0-9_]*$/;
const MAX_NAME_LENGTH = 64;

/**
 * Validate a tool definition
 */
export function validateToolDefinition(definition: ToolDefinition): DefinitionValidationResult {
  const errors: ValidationError[] = [];

  if (!NAME_PATTERN.test(definition.name) || definition.name.length > MAX_NAME_LENGTH) {
    errors.push({
      path: 'name',
      message: `Tool name must match ${NAME_PATTERN} and be at most ${MAX_NAME_LENGTH} characters`,
      code: 'INVALID_NAME'
    });
  }

  if (definition.description.trim() === '') {
    errors.push({ path: 'description', message: 'Description cannot be empty', code: 'EMPTY_DESCRIPTION' });
  }

  const { parameters } = definition;
  if (parameters.type !== 'object') {
    errors.push({ path: 'parameters.type', message: 'Parameters must be an object schema', code: 'INVALID_TYPE' });
  }

  for (const name of parameters.required ?? []) {
    if (!(name in parameters.properties)) {
      errors.push({
        path: `parameters.required`,
        message: `Required parameter "${name}" is not declared in properties`,
        code: 'UNDECLARED_REQUIRED'
      });
    }
  }

  for (const [key, schema] of Object.entries(parameters.properties)) {
    validatePropertySchema(schema, `parameters.properties.${key}`, errors);
  }

  return { valid: errors.length === 0, errors };
}

function validatePropertySchema(schema: PropertySchema, path: string, errors: ValidationError[]): void {
  if (schema.type === 'array' && !schema.items) {
    errors.push({ path: `${path}.items`, message: 'Array parameters must declare items', code: 'MISSING_ITEMS' });
  }

  if (schema.enum && schema.enum.length === 0) {
    errors.push({ path: `${path}.enum`, message: 'Enum cannot be empty', code: 'EMPTY_ENUM' });
  }

  if (schema.items) {
    validatePropertySchema(schema.items, `${path}.items`, errors);
  }

  for (const [key, child] of Object.entries(schema.properties ?? {})) {
    validatePropertySchema(child, `${path}.properties.${key}`, errors);
  }
}
