import { z } from 'zod';
import { ValidationError } from '../utils/errors';

export function parseInput<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(result.error.errors.map((e) => `${e.path.join('.') || 'input'}: ${e.message}`).join(', '));
  }
  return result.data;
}
