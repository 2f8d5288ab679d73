/**
 * Validation helper utilities
 *
 * Provides consistent validation and error handling for API responses
 */

import { z } from 'zod';
import { ValidationError } from '../types/errors';

/**
 * Validates data against a Zod schema
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @param context - Name of the payload, used in error messages
 * @returns Validated and typed data
 * @throws ValidationError if validation fails
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context?: string
): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (parsed.success) {
    return parsed.data;
  }

  const message = context
    ? `Validation failed for ${context}: ${formatZodError(parsed.error)}`
    : `Validation failed: ${formatZodError(parsed.error)}`;

  throw new ValidationError(message, parsed.error.errors, {
    validationErrors: parsed.error.errors,
  });
}

/**
 * Validates data against a Zod schema, returning null on failure instead of throwing
 */
export function validateSafe<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> | null {
  const parsed = schema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

/**
 * Formats Zod validation errors into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
