import { z } from 'zod';
import { NotFoundError } from '../utils/errors.js';

export interface IdParams {
  id: string;
}

const IdSchema = z.coerce.number().int().positive();

/**
 * Numeric path parameter; anything else matches no resource
 */
export function toId(value: string): number {
  const result = IdSchema.safeParse(value);
  if (!result.success) {
    throw NotFoundError.withMessage(`No resource matches id "${value}"`);
  }
  return result.data;
}
