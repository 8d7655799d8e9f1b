/**
 * Dashboard Component
 *
 * Main 2x2 grid layout for the TUI dashboard.
 * Manages panel focus and the global shortcuts.
 */

import React from 'react';
import { Box, Text, useInput, useApp } from 'ink';
import { Panel } from './Panel.js';
import { StatusBar } from './StatusBar.js';
import { useAppContext, PanelId } from '../../context/AppContext.js';

export interface DashboardActions {
  onCopy: () => void;
  onExport: () => void;
  onWatchLatest: () => void;
  onStop: () => void;
  onReset: () => void;
  onCheckDatabase: () => void;
  onOpenHelp: () => void;
}

export interface DashboardProps extends DashboardActions {
  onPanelFocus: (panel: PanelId) => void;
  children: {
    question: React.ReactNode;
    transcript: React.ReactNode;
    result: React.ReactNode;
    sql: React.ReactNode;
  };
}

const NEXT_PANEL: Record<PanelId, PanelId> = { 1: 2, 2: 3, 3: 4, 4: 1 };

function toPanelId(input: string): PanelId | null {
  switch (input) {
    case '1': return 1;
    case '2': return 2;
    case '3': return 3;
    case '4': return 4;
    default: return null;
  }
}

export const Dashboard: React.FC<DashboardProps> = ({
  onPanelFocus,
  children,
  onCopy,
  onExport,
  onWatchLatest,
  onStop,
  onReset,
  onCheckDatabase,
  onOpenHelp,
}) => {
  const { exit } = useApp();
  const { state } = useAppContext();
  const { focusedPanel, view } = state;
  const inputLocked = state.inputCapture !== null || state.modalOpen !== null;

  // Keyboard navigation
  useInput((input, key) => {
    if (inputLocked) {
      return;
    }

    const panel = toPanelId(input);
    if (panel !== null) {
      onPanelFocus(panel);
      return;
    }

    // Tab to cycle focus
    if (key.tab) {
      onPanelFocus(NEXT_PANEL[focusedPanel]);
      return;
    }

    // Shortcuts
    switch (input.toLowerCase()) {
      case 'q':
        exit();
        break;
      case 'c':
        onCopy();
        break;
      case 'x':
        onExport();
        break;
      case 'w':
        onWatchLatest();
        break;
      case 's':
        onStop();
        break;
      case 'n':
        onReset();
        break;
      case 'd':
        onCheckDatabase();
        break;
      case '?':
        onOpenHelp();
        break;
    }
  });

  const rowCount = view.outcome?.ok ? view.outcome.rows.length : null;

  return (
    <Box flexDirection="column" width="100%" flexGrow={1}>
      {/* Top row: Question + Transcript */}
      <Box flexDirection="row" flexGrow={1}>
        <Panel title="QUESTION" hotkey="1" focused={focusedPanel === 1} flexGrow={1}>
          {children.question}
        </Panel>
        <Panel
          title="PROCESSING"
          hotkey="2"
          focused={focusedPanel === 2}
          flexGrow={2}
          status={<Text dimColor>{view.transcript.length} steps</Text>}
        >
          {children.transcript}
        </Panel>
      </Box>

      {/* Bottom row: Result + SQL */}
      <Box flexDirection="row" flexGrow={1}>
        <Panel
          title="RESULT"
          hotkey="3"
          focused={focusedPanel === 3}
          flexGrow={2}
          status={rowCount !== null ? <Text dimColor>{rowCount} rows</Text> : undefined}
        >
          {children.result}
        </Panel>
        <Panel title="SQL" hotkey="4" focused={focusedPanel === 4} flexGrow={1}>
          {children.sql}
        </Panel>
      </Box>

      {/* Status bar */}
      <StatusBar
        pollerState={view.pollerState}
        pollWarning={state.pollWarning}
        toast={state.toast}
      />
    </Box>
  );
};

export default Dashboard;
