/**
 * Query Error Classification
 *
 * Maps the service's error_type values and transport failures to fixed
 * remediation hints and short notices.
 */

import type { ErrorCategory, Notice, QueryTransportFailure } from '../types/index.js';
import { isQueryServiceError } from '../clients/query-service/client.js';
import { isTimeoutError } from '../infra/resilient-fetch.js';

const CATEGORIES: readonly ErrorCategory[] = [
  'database_connection',
  'sql_generation',
  'timeout',
  'validation',
  'processing',
  'unknown',
];

const KNOWN_CATEGORIES: ReadonlySet<string> = new Set(CATEGORIES);

function isErrorCategory(value: string): value is ErrorCategory {
  return KNOWN_CATEGORIES.has(value);
}

export function categorizeErrorType(raw: string | null | undefined): ErrorCategory {
  const normalized = raw?.trim().toLowerCase() ?? '';
  return isErrorCategory(normalized) ? normalized : 'unknown';
}

export const ERROR_HINTS: Record<ErrorCategory, string> = {
  database_connection: [
    '• Check that the database server is running',
    '• Check the network connection',
    '• Try again in a moment',
  ].join('\n'),
  sql_generation: [
    '• Ask the question more specifically',
    '• Check that table and column names are spelled correctly',
    '• e.g. "Show the 5 most recently registered users"',
  ].join('\n'),
  timeout: [
    '• Split the question into simpler ones',
    '• Narrow the conditions',
    '• Try again in a moment',
  ].join('\n'),
  validation: [
    '• Make sure the question is not empty',
    '• Phrase it as a complete sentence',
    '• Use the examples as a guide',
  ].join('\n'),
  processing: [
    '• Try again in a moment',
    '• Phrase the question differently',
    '• Contact an administrator if the problem persists',
  ].join('\n'),
  unknown: [
    '• Try again in a moment',
    '• Contact an administrator if the problem persists',
  ].join('\n'),
};

export const ERROR_NOTICES: Record<ErrorCategory, Notice> = {
  database_connection: { tone: 'warning', text: 'Database connection failed' },
  sql_generation: { tone: 'warning', text: 'SQL generation failed - check the question' },
  timeout: { tone: 'warning', text: 'Processing timed out - try a simpler question' },
  validation: { tone: 'warning', text: 'Input validation failed - check the question' },
  processing: { tone: 'error', text: 'An error occurred while processing' },
  unknown: { tone: 'error', text: 'An error occurred while processing' },
};

export const TRANSPORT_NOTICE: Notice = { tone: 'error', text: 'Could not reach the query service' };

/**
 * Outcome for a request that produced no usable service response
 */
export function describeTransportFailure(error: unknown, baseUrl: string): QueryTransportFailure {
  const reason = error instanceof Error ? error.message : String(error);

  // The service answered, but not with a body this client understands
  if (isQueryServiceError(error) && error.code === 'invalid_response') {
    return {
      ok: false,
      failure: 'transport',
      message: `The query service sent a response that could not be read: ${reason}`,
      hint: `Check that the query service at ${baseUrl} is a version this client supports`,
    };
  }

  const timedOut = isQueryServiceError(error) && isTimeoutError(error.cause);

  return {
    ok: false,
    failure: 'transport',
    message: timedOut ? `The query service did not answer in time: ${reason}` : `An error occurred: ${reason}`,
    hint: `Check that the query service is running (${baseUrl})`,
  };
}
