/**
 * Validator Utilities
 *
 * Schema validation with zod, reporting problems field by field.
 */

import { z } from 'zod';
import { ValidationError, ValidationResult } from './types';

/**
 * Validate unknown data against a schema
 */
export function validateWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { isValid: true, data: result.data, errors: [] };
  }

  return { isValid: false, errors: toValidationErrors(result.error) };
}

export function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.') || '(root)',
    message: err.message
  }));
}

/**
 * One line per problem, e.g. `rankings.0.id: Required`
 */
export function describeValidationErrors(errors: ValidationError[]): string[] {
  return errors.map(e => `${e.field}: ${e.message}`);
}
