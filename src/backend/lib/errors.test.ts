import { describe, expect, it } from 'vitest';
import {
  InvalidArgumentError,
  isDomainError,
  NotFoundError,
  ThreadClosedError,
  UnauthenticatedError,
} from './errors';

describe('domain errors', () => {
  it('carries the class name and code', () => {
    const error = new NotFoundError('Thread not found.');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('NotFoundError');
    expect(error.code).toBe('NOT_FOUND');
    expect(error.message).toBe('Thread not found.');
  });

  it('uses default messages where the taxonomy has one', () => {
    expect(new ThreadClosedError().message).toBe('This thread is closed.');
    expect(new UnauthenticatedError().code).toBe('UNAUTHENTICATED');
  });

  it('recognises domain errors only', () => {
    expect(isDomainError(new InvalidArgumentError('bad'))).toBe(true);
    expect(isDomainError(new Error('plain'))).toBe(false);
    expect(isDomainError('string')).toBe(false);
  });
});
