/**
 * useDatabaseStatus Hook
 *
 * Probes /db-check once on mount and again on demand.
 */

import { useCallback, useEffect } from 'react';
import { useAppContext } from '../context/AppContext.js';
import type { QueryServiceClient } from '../../clients/query-service/client.js';

export function useDatabaseStatus(client: QueryServiceClient) {
  const { state, dispatch } = useAppContext();

  const check = useCallback(async () => {
    dispatch({ type: 'SET_DATABASE_STATUS', status: { phase: 'checking' } });

    try {
      const result = await client.checkDatabase();
      dispatch({ type: 'SET_DATABASE_STATUS', status: { phase: 'done', check: result, checkedAt: new Date() } });
      dispatch({
        type: 'SHOW_TOAST',
        toast: result.success
          ? { tone: 'success', text: result.message }
          : { tone: 'error', text: result.message },
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Database check failed';
      dispatch({ type: 'SET_DATABASE_STATUS', status: { phase: 'unreachable', error: message, checkedAt: new Date() } });
      dispatch({ type: 'SHOW_TOAST', toast: { tone: 'warning', text: 'DB check failed: cannot reach the server' } });
    }
  }, [client, dispatch]);

  useEffect(() => {
    void check();
  }, [check]);

  return { status: state.database, check };
}

export default useDatabaseStatus;
