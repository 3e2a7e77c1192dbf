/**
 * Tests for error parsing
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  HttpStatusError,
  TransportError,
  isRetryable,
  parseHttpStatusError,
} from './errors.js';

const NOW = new Date('2024-03-05T09:07:02Z');

describe('parseHttpStatusError', () => {
  it('should carry status, body and request id', () => {
    const error = parseHttpStatusError(403, 'Forbidden', { 'x-ms-request-id': 'req-1' }, NOW);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error.statusCode).toBe(403);
    expect(error.code).toBe('Http.403');
    expect(error.requestId).toBe('req-1');
    expect(error.message).toBe('Post log request failed with status: 403 Forbidden');
  });

  it('should read Retry-After in seconds', () => {
    const error = parseHttpStatusError(429, '', { 'retry-after': '20' }, NOW);

    expect(error.retryAfter).toBe(20000);
  });

  it('should read Retry-After as an HTTP date', () => {
    const error = parseHttpStatusError(
      503,
      '',
      { 'retry-after': 'Tue, 05 Mar 2024 09:08:02 GMT' },
      NOW
    );

    expect(error.retryAfter).toBe(60000);
  });

  it.each(['Tue, 05 Mar 2024 09:00:00 GMT', 'soon', '1.5', ''])(
    'should ignore Retry-After %j',
    (value) => {
      const error = parseHttpStatusError(503, '', { 'retry-after': value }, NOW);

      expect(error.retryAfter).toBeUndefined();
    }
  );
});

describe('isRetryable', () => {
  it('should accept rejected batches only', () => {
    expect(isRetryable(new HttpStatusError(500, ''))).toBe(true);
    expect(isRetryable(new TransportError('Request timeout after 30000ms', 'Timeout'))).toBe(false);
    expect(isRetryable(new ConfigurationError('bad key', 'InvalidWorkspaceKey'))).toBe(false);
    expect(isRetryable(new Error('boom'))).toBe(false);
    expect(isRetryable('boom')).toBe(false);
  });
});
