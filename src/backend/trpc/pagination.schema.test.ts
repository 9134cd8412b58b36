import { describe, expect, it } from 'vitest';
import { pageInputSchema, toPageRequest } from './pagination.schema';

describe('pageInputSchema', () => {
  it('applies defaults when no input is given', () => {
    expect(pageInputSchema.parse(undefined)).toEqual({ skip: 0, limit: 20 });
  });

  it('rejects negative skip and non-positive limit', () => {
    expect(pageInputSchema.safeParse({ skip: -1 }).success).toBe(false);
    expect(pageInputSchema.safeParse({ limit: 0 }).success).toBe(false);
  });
});

describe('toPageRequest', () => {
  it('caps the limit at the configured maximum', () => {
    expect(toPageRequest({ skip: 40, limit: 500 }, 100)).toEqual({ skip: 40, limit: 100 });
    expect(toPageRequest({ skip: 0, limit: 10 }, 100)).toEqual({ skip: 0, limit: 10 });
  });
});
