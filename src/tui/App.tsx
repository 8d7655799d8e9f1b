/**
 * Main TUI App Component
 *
 * The root component that renders the dashboard with all panels.
 */

import React, { useCallback } from 'react';
import { Box } from 'ink';
import { AppProvider, useAppContext, PanelId } from './context/AppContext.js';
import { Header } from './components/layout/Header.js';
import { Dashboard } from './components/layout/Dashboard.js';
import { QuestionPanel } from './components/panels/QuestionPanel.js';
import { TranscriptPanel } from './components/panels/TranscriptPanel.js';
import { ResultPanel } from './components/panels/ResultPanel.js';
import { SqlPanel } from './components/panels/SqlPanel.js';
import { HelpModal } from './components/modals/HelpModal.js';
import { useQueryController } from './hooks/useQueryController.js';
import { useDatabaseStatus } from './hooks/useDatabaseStatus.js';
import type { TuiConfig } from './utils/config.js';

// Inner app component that uses context
const AppInner: React.FC<{ version: string }> = ({ version }) => {
  const { state, dispatch } = useAppContext();
  const { client, submit, watchLatest, cancel, reset, copyRows, exportRows } = useQueryController();
  const { check } = useDatabaseStatus(client);

  const handlePanelFocus = useCallback((panel: PanelId) => {
    dispatch({ type: 'SET_FOCUSED_PANEL', panel });
  }, [dispatch]);

  const handleOpenHelp = useCallback(() => {
    dispatch({ type: 'OPEN_MODAL', modal: 'help' });
  }, [dispatch]);

  const handleCloseModal = useCallback(() => {
    dispatch({ type: 'CLOSE_MODAL' });
  }, [dispatch]);

  return (
    <Box flexDirection="column" width="100%" height="100%">
      <Header apiUrl={state.config.apiUrl} database={state.database} version={version} />

      <Dashboard
        onPanelFocus={handlePanelFocus}
        onCopy={() => void copyRows()}
        onExport={() => void exportRows()}
        onWatchLatest={watchLatest}
        onStop={cancel}
        onReset={reset}
        onCheckDatabase={() => void check()}
        onOpenHelp={handleOpenHelp}
        children={{
          question: <QuestionPanel onSubmit={submit} />,
          transcript: <TranscriptPanel entries={state.view.transcript} maxEntries={state.config.transcriptLines} />,
          result: <ResultPanel outcome={state.view.outcome} />,
          sql: <SqlPanel outcome={state.view.outcome} visible={state.config.showSql} />,
        }}
      />

      {/* Modals */}
      {state.modalOpen === 'help' && <HelpModal apiUrl={state.config.apiUrl} onClose={handleCloseModal} />}
    </Box>
  );
};

// Main App with provider
export const App: React.FC<{ config?: TuiConfig; version?: string }> = ({ config, version = '0.1.0' }) => {
  return (
    <AppProvider config={config}>
      <AppInner version={version} />
    </AppProvider>
  );
};

export default App;
