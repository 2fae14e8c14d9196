/**
 * Request validation with zod; failures surface as 400 VALIDATION_ERROR
 */

import type { z } from 'zod';
import { ValidationError } from '../../application/errors.js';

export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const firstError = result.error.errors[0];
    throw new ValidationError(firstError?.message ?? 'Invalid request data');
  }
  return result.data;
}
