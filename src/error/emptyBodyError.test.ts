import { describe, expect, it } from 'vitest';
import { EmptyBodyError, isEmptyBodyError } from './emptyBodyError.js';

describe('EmptyBodyError', () => {
  it('names the status in the default message', () => {
    const err = new EmptyBodyError(200);
    expect(err.message).toBe('error empty body for status 200');
    expect(err.status).toBe(200);
  });

  it('is distinguishable from plain errors', () => {
    expect(isEmptyBodyError(new EmptyBodyError(201))).toBe(true);
    expect(isEmptyBodyError(new Error('empty'))).toBe(false);
  });
});
