/**
 * useQueryController Hook
 *
 * Owns the QueryController for the lifetime of the dashboard and mirrors its
 * view state into the app context. Poll warnings go to the status bar rather
 * than the console, which would tear the ink layout.
 */

import { useCallback, useEffect, useMemo } from 'react';
import { useAppContext } from '../context/AppContext.js';
import { QueryController } from '../../query/controller.js';
import { QueryServiceClient } from '../../clients/query-service/client.js';
import type { PollerLogger } from '../../session/poller.js';
import { copyRowsToClipboard, writeWorkbook } from '../../export/table-export.js';
import { getConfig } from '../../config.js';

export interface UseQueryControllerResult {
  client: QueryServiceClient;
  submit: (question: string) => Promise<void>;
  watchLatest: () => void;
  cancel: () => void;
  reset: () => void;
  copyRows: () => Promise<void>;
  exportRows: () => Promise<void>;
}

export function useQueryController(): UseQueryControllerResult {
  const { state, dispatch } = useAppContext();
  const { apiUrl, exportDir } = state.config;

  const client = useMemo(() => {
    const service = getConfig();
    return new QueryServiceClient({
      baseUrl: apiUrl,
      retry: { timeoutMs: service.requestTimeoutMs },
      queryTimeoutMs: service.queryTimeoutMs,
    });
  }, [apiUrl]);

  const controller = useMemo(() => {
    const logger: PollerLogger = {
      debug: () => undefined,
      warn: (message, error) => {
        const reason = error instanceof Error ? `: ${error.message}` : '';
        dispatch({ type: 'SET_POLL_WARNING', warning: `${message}${reason}` });
      },
    };
    return new QueryController({
      client,
      pollIntervalMs: getConfig().pollIntervalMs,
      logger,
    });
  }, [client, dispatch]);

  useEffect(() => {
    const unsubscribe = controller.subscribe(view => dispatch({ type: 'SET_VIEW', view }));
    return () => {
      unsubscribe();
      controller.dispose();
    };
  }, [controller, dispatch]);

  const submit = useCallback(async (question: string) => {
    dispatch({ type: 'SET_POLL_WARNING', warning: null });
    await controller.submit(question);
  }, [controller, dispatch]);

  const watchLatest = useCallback(() => {
    dispatch({ type: 'SET_POLL_WARNING', warning: null });
    controller.watch();
  }, [controller, dispatch]);

  const cancel = useCallback(() => controller.cancel(), [controller]);
  const reset = useCallback(() => controller.reset(), [controller]);

  const outcome = state.view.outcome;
  const rows = outcome?.ok ? outcome.rows : [];

  const copyRows = useCallback(async () => {
    if (rows.length === 0) {
      dispatch({ type: 'SHOW_TOAST', toast: { tone: 'info', text: 'No result rows to copy' } });
      return;
    }
    try {
      const copied = await copyRowsToClipboard(rows);
      dispatch({ type: 'SHOW_TOAST', toast: { tone: 'success', text: `Copied ${copied} rows to the clipboard` } });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Clipboard unavailable';
      dispatch({ type: 'SHOW_TOAST', toast: { tone: 'error', text: `Copy failed: ${message}` } });
    }
  }, [rows, dispatch]);

  const exportRows = useCallback(async () => {
    if (rows.length === 0) {
      dispatch({ type: 'SHOW_TOAST', toast: { tone: 'info', text: 'No result rows to export' } });
      return;
    }
    try {
      const filePath = await writeWorkbook(rows, exportDir);
      dispatch({ type: 'SHOW_TOAST', toast: { tone: 'success', text: `Saved ${filePath}` } });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Export failed';
      dispatch({ type: 'SHOW_TOAST', toast: { tone: 'error', text: `Export failed: ${message}` } });
    }
  }, [rows, exportDir, dispatch]);

  return { client, submit, watchLatest, cancel, reset, copyRows, exportRows };
}

export default useQueryController;
