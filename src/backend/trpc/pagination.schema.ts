import { z } from 'zod';
import type { PageRequest } from '@/backend/resource_accessors/pagination';

export const DEFAULT_PAGE_SIZE = 20;

export const pageInputSchema = z
  .object({
    skip: z.number().int().min(0).default(0),
    limit: z.number().int().min(1).default(DEFAULT_PAGE_SIZE),
  })
  .default({});

export function toPageRequest(
  input: z.infer<typeof pageInputSchema>,
  maxPageSize: number
): PageRequest {
  return { skip: input.skip, limit: Math.min(input.limit, maxPageSize) };
}
