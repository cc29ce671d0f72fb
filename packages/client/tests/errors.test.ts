import { describe, expect, it } from 'vitest';
import { BridgeClientError, isAbortError, toWireError } from '../src/errors.js';

describe('toWireError', () => {
  it('keeps the error name', () => {
    const err = new Error('The operation either timed out or was not allowed.');
    err.name = 'NotAllowedError';

    expect(toWireError(err)).toEqual({
      name: 'NotAllowedError',
      message: 'The operation either timed out or was not allowed.',
    });
  });

  it('stringifies non-errors', () => {
    expect(toWireError('boom')).toEqual({ name: 'Error', message: 'boom' });
  });
});

describe('isAbortError', () => {
  it('matches on name', () => {
    const err = new Error('aborted');
    err.name = 'AbortError';
    expect(isAbortError(err)).toBe(true);
    expect(isAbortError(new Error('aborted'))).toBe(false);
    expect(isAbortError('AbortError')).toBe(false);
  });
});

describe('BridgeClientError', () => {
  it('carries code and status', () => {
    const err = new BridgeClientError('SERVER_ERROR', 'Circuit not found', 404);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('BridgeClientError');
    expect(err.code).toBe('SERVER_ERROR');
    expect(err.statusCode).toBe(404);
  });
});
