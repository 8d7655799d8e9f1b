/**
 * Query Controller
 *
 * Ties the service client, the session poller and the formatter together
 * for a front end. Exposes one observable view state:
 * - the live transcript and poller state
 * - whether a submission is pending
 * - the outcome of the last submission and a transient notice
 */

import type {
  Notice,
  QueryOutcome,
  TranscriptEntry,
} from '../types/index.js';
import type { QueryServiceClient } from '../clients/query-service/client.js';
import type { QueryResponse } from '../clients/query-service/schemas.js';
import { SessionPoller, consoleLogger, type PollerLogger, type PollerState } from '../session/poller.js';
import type { PacingOptions } from '../session/transcript.js';
import { formatQuery } from '../format/sql-formatter.js';
import {
  categorizeErrorType,
  describeTransportFailure,
  ERROR_HINTS,
  ERROR_NOTICES,
  TRANSPORT_NOTICE,
} from './errors.js';

export interface QueryViewState {
  transcript: readonly TranscriptEntry[];
  pollerState: PollerState;
  submitting: boolean;
  /** Submission pending or session still being followed */
  inProgress: boolean;
  question: string | null;
  outcome: QueryOutcome | null;
  notice: Notice | null;
}

export type QueryViewListener = (state: QueryViewState) => void;

/**
 * The part of the service client the controller talks to
 */
export type QueryClient = Pick<QueryServiceClient, 'baseUrl' | 'submitQuery' | 'getLatestSessionId' | 'getSession'>;

export interface QueryControllerOptions {
  client: QueryClient;
  pollIntervalMs?: number;
  pacing?: Partial<PacingOptions>;
  logger?: PollerLogger;
  now?: () => Date;
}

const FALLBACK_RESULT_MESSAGE = 'No result message was returned.';

/**
 * Convert a /query body into an outcome. success is taken from the flag,
 * never from the wording of the result text.
 */
export function toQueryOutcome(response: QueryResponse): QueryOutcome {
  if (response.success) {
    const sql = response.sql ?? '';
    return {
      ok: true,
      message: response.result ?? FALLBACK_RESULT_MESSAGE,
      sql,
      formattedSql: formatQuery(sql),
      rows: response.data ?? [],
      debugInfo: response.debug_info ?? null,
    };
  }

  const category = categorizeErrorType(response.error_type);
  return {
    ok: false,
    failure: 'application',
    category,
    message: response.result ?? FALLBACK_RESULT_MESSAGE,
    hint: ERROR_HINTS[category],
    details: response.error_details || null,
  };
}

export class QueryController {
  private readonly client: QueryClient;
  private readonly poller: SessionPoller;
  private readonly logger: PollerLogger;
  private readonly listeners = new Set<QueryViewListener>();
  private readonly unsubscribePoller: Array<() => void> = [];

  private submitting = false;
  private submission = 0;
  private question: string | null = null;
  private outcome: QueryOutcome | null = null;
  private notice: Notice | null = null;

  constructor(options: QueryControllerOptions) {
    this.client = options.client;
    this.logger = options.logger ?? consoleLogger;
    this.poller = new SessionPoller({
      source: options.client,
      intervalMs: options.pollIntervalMs,
      pacing: options.pacing,
      logger: this.logger,
      now: options.now,
    });

    this.unsubscribePoller.push(
      this.poller.onTranscriptChanged(() => this.emit()),
      this.poller.onStateChanged(() => this.emit())
    );
  }

  get state(): QueryViewState {
    return {
      transcript: this.poller.transcript,
      pollerState: this.poller.state,
      submitting: this.submitting,
      inProgress: this.submitting || this.poller.inProgress,
      question: this.question,
      outcome: this.outcome,
      notice: this.notice,
    };
  }

  subscribe(listener: QueryViewListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Submit a question and follow the session it creates.
   * Returns null for blank input or when superseded by a newer submission.
   */
  async submit(text: string): Promise<QueryOutcome | null> {
    const question = text.trim();
    if (!question) {
      return null;
    }

    const submission = ++this.submission;
    this.submitting = true;
    this.question = question;
    this.outcome = null;
    this.notice = null;
    this.poller.reset();
    this.emit();

    // The session that is newest now belongs to an earlier question
    let previousSessionId: string | null = null;
    try {
      previousSessionId = await this.client.getLatestSessionId();
    } catch (error) {
      this.logger.warn('could not read the latest session before submitting', error);
    }
    if (submission !== this.submission) {
      return null;
    }

    this.poller.start({ excludeSessionId: previousSessionId });

    let outcome: QueryOutcome;
    try {
      outcome = toQueryOutcome(await this.client.submitQuery(question));
    } catch (error) {
      outcome = describeTransportFailure(error, this.client.baseUrl);
    }

    if (submission !== this.submission) {
      return null;
    }

    this.submitting = false;
    this.outcome = outcome;
    this.notice = outcome.ok
      ? { tone: 'success', text: `Query finished (${outcome.rows.length} rows)` }
      : outcome.failure === 'application'
        ? ERROR_NOTICES[outcome.category]
        : TRANSPORT_NOTICE;
    this.emit();
    return outcome;
  }

  /**
   * Follow an existing session, or the newest one when no id is given
   */
  watch(sessionId?: string): void {
    this.submission++;
    this.submitting = false;
    this.notice = null;
    if (sessionId) {
      this.poller.start({ sessionId });
    } else {
      this.poller.start({});
    }
    this.emit();
  }

  cancel(): void {
    this.submission++;
    this.submitting = false;
    this.poller.cancel();
    this.emit();
  }

  reset(): void {
    this.submission++;
    this.submitting = false;
    this.question = null;
    this.outcome = null;
    this.notice = null;
    this.poller.reset();
    this.emit();
  }

  setNotice(notice: Notice | null): void {
    this.notice = notice;
    this.emit();
  }

  dispose(): void {
    this.poller.reset();
    for (const unsubscribe of this.unsubscribePoller) {
      unsubscribe();
    }
    this.listeners.clear();
  }

  private emit(): void {
    const snapshot = this.state;
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
