/**
 * Query Service Client
 *
 * Transport adapter for the remote text-to-SQL service:
 * - POST /query           submit a question
 * - GET  /db-check        database connectivity probe
 * - GET  /latest-session  newest processing session id
 * - GET  /session/{id}    session snapshot
 * - GET  /health          liveness
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  resilientFetch,
  isResilientFetchError,
  type RetryConfig,
} from '../../infra/resilient-fetch.js';
import type { DatabaseCheck, HealthStatus, SessionSnapshot } from '../../types/index.js';
import type { SessionSource } from '../../session/poller.js';
import {
  databaseCheckResponseSchema,
  healthResponseSchema,
  latestSessionResponseSchema,
  queryResponseSchema,
  sessionResponseSchema,
  type QueryResponse,
} from './schemas.js';

export type QueryServiceErrorCode = 'transport' | 'invalid_response';

export class QueryServiceError extends Error {
  readonly code: QueryServiceErrorCode;
  readonly endpoint: string;
  readonly statusCode?: number;

  constructor(code: QueryServiceErrorCode, endpoint: string, message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, { cause: options?.cause });
    this.name = 'QueryServiceError';
    this.code = code;
    this.endpoint = endpoint;
    this.statusCode = options?.statusCode;
  }
}

export function isQueryServiceError(error: unknown): error is QueryServiceError {
  return error instanceof QueryServiceError;
}

export interface QueryServiceClientOptions {
  baseUrl: string;
  /** Applied to the read endpoints */
  retry?: Partial<RetryConfig>;
  /** Timeout for query submission, which can take minutes (default: 120000) */
  queryTimeoutMs?: number;
}

export class QueryServiceClient implements SessionSource {
  readonly baseUrl: string;
  private readonly retry: Partial<RetryConfig>;
  private readonly queryTimeoutMs: number;

  constructor(options: QueryServiceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.retry = options.retry ?? {};
    this.queryTimeoutMs = options.queryTimeoutMs ?? 120000;
  }

  /**
   * Submit a question. Never retried: a resubmission would start a second session.
   * success=false still arrives as a regular response.
   */
  async submitQuery(query: string): Promise<QueryResponse> {
    return this.request('/query', queryResponseSchema, {
      init: { method: 'POST', body: JSON.stringify({ query }) },
      retry: { maxRetries: 0, timeoutMs: this.queryTimeoutMs },
    });
  }

  async checkDatabase(): Promise<DatabaseCheck> {
    const body = await this.request('/db-check', databaseCheckResponseSchema);
    return {
      success: body.success,
      message: body.message ?? (body.success ? 'Database connection OK' : 'Database connection failed'),
      connectionTime: body.connection_time ?? null,
      databaseInfo: body.database_info ?? null,
    };
  }

  async checkHealth(): Promise<HealthStatus> {
    const body = await this.request('/health', healthResponseSchema);
    return { status: body.status, timestamp: body.timestamp ?? null };
  }

  /**
   * Newest session id, or null while none exists yet
   */
  async getLatestSessionId(): Promise<string | null> {
    const body = await this.request('/latest-session', latestSessionResponseSchema);
    return body.session_id || null;
  }

  async getSession(sessionId: string): Promise<SessionSnapshot> {
    const body = await this.request(`/session/${encodeURIComponent(sessionId)}`, sessionResponseSchema);
    const finalResult = body.final_result;

    return {
      sessionId,
      interactions: body.agent_interactions ?? [],
      finalResult: finalResult
        ? (typeof finalResult.error_message === 'string' ? { errorMessage: finalResult.error_message } : {})
        : null,
    };
  }

  private async request<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: { init?: RequestInit; retry?: Partial<RetryConfig> } = {}
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;

    let body: unknown;
    try {
      body = await resilientFetch(url, options.init, { ...this.retry, ...options.retry });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new QueryServiceError('transport', path, `${path} failed: ${message}`, {
        cause: error,
        statusCode: isResilientFetchError(error) ? error.statusCode : undefined,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new QueryServiceError(
        'invalid_response',
        path,
        `${path} returned an unexpected body${where}: ${issue?.message ?? 'invalid'}`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }
}
