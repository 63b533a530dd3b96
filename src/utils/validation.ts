/**
 * Request validation helpers built on Zod.
 */

import { z, ZodError, ZodTypeAny } from 'zod';
import { NON_FIELD_ERRORS, ValidationError, type FieldErrors } from './errors.js';

export const PHONE_REGEX = /^\+?1?\d{9,15}$/;
export const PHONE_MESSAGE =
  "Phone number must be entered in the format: '+999999999'. Up to 15 digits allowed.";
export const HEX_COLOR_REGEX = /^#[0-9a-fA-F]{6}$/;

export const PageQuerySchema = z.object({
  page: z.coerce.number().int().positive().default(1),
});

/**
 * Optional text field: absent and blank both become ''
 */
export const optionalText = (max: number) => z.string().trim().max(max).optional().default('');

/**
 * Accepts an ISO datetime string (or Date) and yields a Date
 */
export const dateTime = z.coerce.date({
  errorMap: () => ({ message: 'Enter a valid date/time.' }),
});

export function zodToFieldErrors(error: ZodError): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : NON_FIELD_ERRORS;
    (fieldErrors[key] ??= []).push(issue.message);
  }
  return fieldErrors;
}

/**
 * Parse input against a schema, raising ValidationError with per-field messages
 */
export function parseInput<T extends ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const fieldErrors = zodToFieldErrors(result.error);
    const first = Object.values(fieldErrors)[0]?.[0] ?? 'Validation failed';
    throw new ValidationError(fieldErrors, first);
  }
  return result.data;
}
