/**
 * Tool argument validation
 * Validates tool arguments using Zod schemas
 */

import type { z } from 'zod';

export type ValidationResult<T> = { success: true; data: T } | { success: false; errors: ValidationError[] };

export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Validate tool arguments against schema
 */
export function validateToolArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(args);
  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map(err => ({
      path: err.path.join('.'),
      message: err.message,
    })),
  };
}

/**
 * Format validation errors for user
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  if (errors.length === 0) {
    return 'No validation errors';
  }

  const formatted = errors.map(err => (err.path ? `${err.path}: ${err.message}` : err.message));

  return `Validation errors:\n${formatted.join('\n')}`;
}
