/**
 * Validation Module
 *
 * Zod schemas and field-level validation helpers.
 */

export * from './validator';
export * from './schemas';
export * from './types';
