/**
 * Query Controller Tests
 *
 * Submission flow against a fake service client: outcomes, notices,
 * stale submissions and session following.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { QueryController, toQueryOutcome, type QueryClient, type QueryViewState } from '../query/controller.js';
import { ERROR_HINTS, ERROR_NOTICES, TRANSPORT_NOTICE } from '../query/errors.js';
import type { QueryResponse } from '../clients/query-service/schemas.js';
import type { SessionSnapshot } from '../types/index.js';

const NO_PACING = { inputPauseMs: 0, outputPauseMs: 0 };

function createClient(response: QueryResponse) {
  return {
    baseUrl: 'http://test.local',
    submitQuery: vi.fn(async (_query: string): Promise<QueryResponse> => response),
    getLatestSessionId: vi.fn(async (): Promise<string | null> => 'old'),
    getSession: vi.fn(async (sessionId: string): Promise<SessionSnapshot> => ({
      sessionId,
      interactions: [],
      finalResult: null,
    })),
  } satisfies QueryClient;
}

function createController(client: QueryClient) {
  const logger = { debug: vi.fn(), warn: vi.fn() };
  const controller = new QueryController({ client, pollIntervalMs: 1000, pacing: NO_PACING, logger });
  return { controller, logger };
}

describe('toQueryOutcome', () => {
  it('should take success from the flag, not the wording', () => {
    const outcome = toQueryOutcome({ success: true, result: 'error count is 0', sql: 'SELECT 0', data: [] });

    expect(outcome.ok).toBe(true);
  });

  it('should fill in missing fields of a success', () => {
    expect(toQueryOutcome({ success: true })).toEqual({
      ok: true,
      message: 'No result message was returned.',
      sql: '',
      formattedSql: '',
      rows: [],
      debugInfo: null,
    });
  });

  it('should categorize failures case-insensitively', () => {
    expect(toQueryOutcome({
      success: false,
      result: 'Could not generate SQL',
      error_type: 'SQL_GENERATION',
      error_details: 'no table named foo',
    })).toEqual({
      ok: false,
      failure: 'application',
      category: 'sql_generation',
      message: 'Could not generate SQL',
      hint: ERROR_HINTS.sql_generation,
      details: 'no table named foo',
    });
  });

  it('should fall back to the unknown category', () => {
    const outcome = toQueryOutcome({ success: false, error_type: 'quota' });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok && outcome.failure === 'application') {
      expect(outcome.category).toBe('unknown');
      expect(outcome.details).toBeNull();
    }
  });
});

describe('QueryController', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return the formatted outcome and a success notice', async () => {
    const client = createClient({
      success: true,
      result: 'Found 2 users',
      sql: 'SELECT id,name FROM users',
      data: [{ id: 1, name: 'Ann' }, { id: 2, name: 'Bo' }],
    });
    const { controller } = createController(client);

    const outcome = await controller.submit('  who signed up?  ');

    expect(client.submitQuery).toHaveBeenCalledWith('who signed up?');
    expect(outcome).toEqual({
      ok: true,
      message: 'Found 2 users',
      sql: 'SELECT id,name FROM users',
      formattedSql: 'SELECT id,\n    name\nFROM users',
      rows: [{ id: 1, name: 'Ann' }, { id: 2, name: 'Bo' }],
      debugInfo: null,
    });
    expect(controller.state.notice).toEqual({ tone: 'success', text: 'Query finished (2 rows)' });
    expect(controller.state.submitting).toBe(false);
    expect(controller.state.question).toBe('who signed up?');
    controller.dispose();
  });

  it('should follow a new session but not the one that was latest before submitting', async () => {
    const client = createClient({ success: true, data: [] });
    const { controller } = createController(client);

    await controller.submit('count orders');
    await vi.advanceTimersByTimeAsync(2000);

    expect(controller.state.pollerState).toBe('discovering');
    expect(client.getSession).not.toHaveBeenCalled();

    client.getLatestSessionId.mockResolvedValue('fresh');
    await vi.advanceTimersByTimeAsync(1000);

    expect(client.getSession).toHaveBeenCalledWith('fresh');
    expect(controller.state.pollerState).toBe('polling');
    controller.dispose();
  });

  it('should report application failures with their notice', async () => {
    const client = createClient({ success: false, result: 'Timed out', error_type: 'timeout' });
    const { controller } = createController(client);

    const outcome = await controller.submit('everything ever');

    expect(outcome).toMatchObject({ ok: false, failure: 'application', category: 'timeout' });
    expect(controller.state.notice).toEqual(ERROR_NOTICES.timeout);
    controller.dispose();
  });

  it('should turn a transport error into a transport failure', async () => {
    const client = createClient({ success: true });
    client.submitQuery.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const { controller } = createController(client);

    const outcome = await controller.submit('anything');

    expect(outcome).toEqual({
      ok: false,
      failure: 'transport',
      message: 'An error occurred: connect ECONNREFUSED',
      hint: 'Check that the query service is running (http://test.local)',
    });
    expect(controller.state.notice).toEqual(TRANSPORT_NOTICE);
    controller.dispose();
  });

  it('should ignore blank questions', async () => {
    const client = createClient({ success: true });
    const { controller } = createController(client);

    await expect(controller.submit('   ')).resolves.toBeNull();
    expect(client.submitQuery).not.toHaveBeenCalled();
    expect(controller.state.pollerState).toBe('idle');
    controller.dispose();
  });

  it('should still submit when the latest session cannot be read', async () => {
    const client = createClient({ success: true, data: [] });
    client.getLatestSessionId.mockRejectedValueOnce(new Error('503'));
    const { controller, logger } = createController(client);

    const outcome = await controller.submit('count orders');

    expect(outcome?.ok).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      'could not read the latest session before submitting',
      expect.any(Error)
    );
    controller.dispose();
  });

  it('should drop the outcome of a submission superseded by reset', async () => {
    let answer: (response: QueryResponse) => void = () => undefined;
    const client = createClient({ success: true });
    client.submitQuery.mockImplementation(() => new Promise<QueryResponse>(resolve => {
      answer = resolve;
    }));
    const { controller } = createController(client);

    const pending = controller.submit('slow question');
    await vi.advanceTimersByTimeAsync(1);
    controller.reset();
    answer({ success: true, result: 'late', data: [{ id: 1 }] });

    await expect(pending).resolves.toBeNull();
    expect(controller.state.outcome).toBeNull();
    expect(controller.state.question).toBeNull();
    expect(controller.state.pollerState).toBe('idle');
    controller.dispose();
  });

  it('should publish the submitting state before the answer arrives', async () => {
    const client = createClient({ success: true, data: [] });
    const { controller } = createController(client);
    const states: QueryViewState[] = [];
    controller.subscribe(state => states.push(state));

    await controller.submit('count orders');

    expect(states[0]).toMatchObject({ submitting: true, inProgress: true, question: 'count orders' });
    expect(states[states.length - 1].submitting).toBe(false);
    controller.dispose();
  });

  it('should follow a given session until it completes', async () => {
    const client = createClient({ success: true });
    client.getSession.mockResolvedValue({
      sessionId: 'abc',
      interactions: [{ agent: 'sql_executor', input: '', output: '2 rows' }],
      finalResult: {},
    });
    const { controller } = createController(client);

    controller.watch('abc');
    await vi.advanceTimersByTimeAsync(1);

    expect(controller.state.transcript.map(entry => entry.text)).toEqual(['2 rows', 'Processing complete.']);
    expect(controller.state.pollerState).toBe('completed');
    expect(controller.state.inProgress).toBe(false);
    controller.dispose();
  });

  it('should stop following on cancel', async () => {
    const client = createClient({ success: true });
    const { controller } = createController(client);

    controller.watch();
    controller.cancel();

    expect(controller.state.pollerState).toBe('cancelled');
    expect(vi.getTimerCount()).toBe(0);
    controller.dispose();
  });
});
