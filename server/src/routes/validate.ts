import { z } from 'zod';
import { HttpError } from '../errors';

const idSchema = z.string().uuid();

/** Route ids that are not UUIDs cannot match a row, so they 404 like a miss. */
export function parseId(raw: string, entity: string): string {
  const result = idSchema.safeParse(raw);
  if (!result.success) {
    throw new HttpError(404, `${entity} not found`);
  }
  return result.data;
}

export const isId = (raw: string): boolean => idSchema.safeParse(raw).success;

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new HttpError(400, result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

export const optionalWeek = z.coerce
  .number({ invalid_type_error: 'week must be a number' })
  .int('week must be an integer')
  .min(1, 'week must be 1-21')
  .max(21, 'week must be 1-21')
  .optional();
