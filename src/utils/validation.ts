import { z } from 'zod';
import { ValidationError } from '../middleware/errorHandler.js';
import { SortOption, VoteFilter } from '../types/index.js';

export const MAX_PAGE_SIZE = 250;

export const schemas = {
  votesQuery: z.object({
    url: z.string().trim().url(),
    offset: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(50),
    votes_filter: z.nativeEnum(VoteFilter).default(VoteFilter.All),
    sort_by: z.nativeEnum(SortOption).default(SortOption.DatetimeDesc),
    username: z.string().trim().min(1).max(255).optional(),
  }),
};

/** Validates a query string, throwing ValidationError with the zod issues. */
export function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: unknown): T {
  const result = schema.safeParse(query);
  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError('Invalid query parameters', details);
  }
  return result.data;
}
