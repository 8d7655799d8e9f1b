/**
 * Error Classification Tests
 */

import { describe, it, expect } from 'vitest';
import { categorizeErrorType, describeTransportFailure, ERROR_HINTS, ERROR_NOTICES } from '../query/errors.js';
import { QueryServiceError } from '../clients/query-service/client.js';
import { ResilientFetchError } from '../infra/resilient-fetch.js';

describe('categorizeErrorType', () => {
  it('should accept known categories in any case', () => {
    expect(categorizeErrorType('database_connection')).toBe('database_connection');
    expect(categorizeErrorType(' Validation ')).toBe('validation');
  });

  it('should map anything else to unknown', () => {
    expect(categorizeErrorType('disk_full')).toBe('unknown');
    expect(categorizeErrorType(null)).toBe('unknown');
    expect(categorizeErrorType(undefined)).toBe('unknown');
  });
});

describe('hints and notices', () => {
  it('should give every category a bulleted hint', () => {
    for (const hint of Object.values(ERROR_HINTS)) {
      expect(hint.split('\n').every(line => line.startsWith('• '))).toBe(true);
    }
  });

  it('should treat processing failures as errors and input problems as warnings', () => {
    expect(ERROR_NOTICES.processing.tone).toBe('error');
    expect(ERROR_NOTICES.sql_generation.tone).toBe('warning');
  });
});

describe('describeTransportFailure', () => {
  it('should call out timeouts', () => {
    const lastError = new Error('Request timed out after 120000ms');
    lastError.name = 'AbortError';
    const cause = new ResilientFetchError('Request failed after 1 attempt(s): Request timed out after 120000ms', 'http://x/query', 1, lastError);
    const error = new QueryServiceError('transport', '/query', '/query failed: timed out', { cause });

    expect(describeTransportFailure(error, 'http://x').message).toBe(
      'The query service did not answer in time: /query failed: timed out'
    );
  });

  it('should not blame a running service for a body it could not read', () => {
    const error = new QueryServiceError('invalid_response', '/query', '/query returned an unexpected body at success: Required');

    expect(describeTransportFailure(error, 'http://x')).toEqual({
      ok: false,
      failure: 'transport',
      message: 'The query service sent a response that could not be read: /query returned an unexpected body at success: Required',
      hint: 'Check that the query service at http://x is a version this client supports',
    });
  });

  it('should accept non-error values', () => {
    expect(describeTransportFailure('socket hang up', 'http://x').message).toBe('An error occurred: socket hang up');
  });
});
