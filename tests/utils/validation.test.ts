/**
 * Validation and error helper tests
 */

import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import {
  FieldErrorCollector,
  NON_FIELD_ERRORS,
  NotFoundError,
  ValidationError,
} from '../../src/utils/errors.js';
import { PHONE_REGEX, dateTime, parseInput, zodToFieldErrors } from '../../src/utils/validation.js';

describe('parseInput', () => {
  const schema = z.object({
    name: z.string().min(1, 'This field is required.'),
    crew: z.object({ size: z.number().int().min(1, 'At least one crew member.') }),
  });

  test('should return the parsed value', () => {
    expect(parseInput(schema, { name: 'Wind Dancer', crew: { size: 3 } })).toEqual({
      name: 'Wind Dancer',
      crew: { size: 3 },
    });
  });

  test('should key errors by dotted path', () => {
    try {
      parseInput(schema, { name: '', crew: { size: 0 } });
      expect.unreachable('parseInput should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('This field is required.');
        expect(error.fieldErrors).toEqual({
          name: ['This field is required.'],
          'crew.size': ['At least one crew member.'],
        });
      }
    }
  });

  test('should put top-level errors under the non-field key', () => {
    const result = z.string().safeParse(42);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(Object.keys(zodToFieldErrors(result.error))).toEqual([NON_FIELD_ERRORS]);
    }
  });
});

describe('field helpers', () => {
  test('should coerce ISO strings to dates', () => {
    expect(dateTime.parse('2030-06-01T16:00:00.000Z').toISOString()).toBe('2030-06-01T16:00:00.000Z');
    expect(dateTime.safeParse('not a date').success).toBe(false);
  });

  test('should accept international phone numbers', () => {
    expect(PHONE_REGEX.test('+12065550100')).toBe(true);
    expect(PHONE_REGEX.test('206-555-0100')).toBe(false);
  });
});

describe('errors', () => {
  test('should collect messages per field and throw once', () => {
    const errors = new FieldErrorCollector();
    errors.add('email', 'Enter a valid email address.');
    errors.add('email', 'A user with this email already exists.');
    errors.add('password2', "The two password fields didn't match.");

    expect(errors.has('email')).toBe(true);
    expect(errors.has('firstName')).toBe(false);
    expect(() => errors.throwIfAny()).toThrow('Enter a valid email address.');
  });

  test('should not throw without errors', () => {
    expect(() => new FieldErrorCollector().throwIfAny()).not.toThrow();
  });

  test('should carry status codes', () => {
    expect(ValidationError.forField('name', 'Required').statusCode).toBe(400);
    expect(new NotFoundError('Event', 7).message).toBe('Event 7 not found');
    expect(NotFoundError.withMessage('File not found on server.').statusCode).toBe(404);
  });
});
