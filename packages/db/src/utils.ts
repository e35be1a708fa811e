import {z} from 'zod';

import {DbRepositoryError} from './errors.js';

export const toIsoString = (date: Date): string => date.toISOString();

export const toNullableIsoString = (date: Date | null): string | null => (date ? date.toISOString() : null);

// Escapes LIKE metacharacters so user input only ever matches literally (backslash is the default escape).
export const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/gu, match => `\\${match}`);

export const PageBoundsSchema = z
  .object({
    page: z.number().int().min(1),
    limit: z.number().int().min(1).max(500)
  })
  .strict();

export const assertPageBounds = ({page, limit}: {page: number; limit: number}) => {
  const parsed = PageBoundsSchema.safeParse({page, limit});
  if (!parsed.success) {
    throw new DbRepositoryError('validation_error', 'page and limit must be positive integers');
  }

  return {...parsed.data, offset: (parsed.data.page - 1) * parsed.data.limit};
};

export const parseRecord = <TSchema extends z.ZodType>(schema: TSchema, value: unknown, label: string): z.infer<TSchema> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new DbRepositoryError('validation_error', `Invalid ${label} record`);
  }

  return parsed.data;
};
