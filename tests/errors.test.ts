import { describe, it, expect } from 'vitest';
import {
  NotFoundError,
  RemoteError,
  TransportError,
  ValidationWarning,
  describeError,
  isTransientError,
} from '../src/utils/errors.js';

describe('describeError', () => {
  it('should list the cause chain', () => {
    const root = new Error('connect ECONNREFUSED');
    const err = new TransportError('GET /rest/v1/items failed', { cause: root });

    expect(describeError(err)).toBe('GET /rest/v1/items failed\n  caused by: connect ECONNREFUSED');
  });

  it('should handle non-Error values', () => {
    expect(describeError('boom')).toBe('boom');
  });
});

describe('isTransientError', () => {
  it('should only accept errors flagged transient', () => {
    expect(isTransientError(new RemoteError('HTTP 503', { status: 503, transient: true }))).toBe(true);
    expect(isTransientError(new RemoteError('HTTP 400', { status: 400 }))).toBe(false);
    expect(isTransientError(new NotFoundError('HTTP 404'))).toBe(false);
    expect(isTransientError(new Error('plain'))).toBe(false);
  });
});

describe('ValidationWarning', () => {
  it('should append the item context', () => {
    expect(String(new ValidationWarning('No description table', { itemId: 7, sequence: '1.2' })))
      .toBe('No description table (ID=7, seq=1.2)');
    expect(String(new ValidationWarning('Deep path'))).toBe('Deep path');
  });
});
