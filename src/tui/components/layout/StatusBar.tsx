/**
 * StatusBar Component
 *
 * Bottom status bar showing keyboard shortcuts, session state and the latest notice.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { PollerState } from '../../../session/poller.js';
import type { Notice, NoticeTone } from '../../../types/index.js';

export interface StatusBarProps {
  pollerState: PollerState;
  pollWarning: string | null;
  toast: Notice | null;
}

const STATE_COLORS: Record<PollerState, string> = {
  idle: 'gray',
  discovering: 'yellow',
  polling: 'cyan',
  completed: 'green',
  cancelled: 'magenta',
};

const TONE_COLORS: Record<NoticeTone, string> = {
  success: 'green',
  info: 'white',
  warning: 'yellow',
  error: 'red',
};

const KeyHint: React.FC<{ shortcut: string; label: string }> = ({ shortcut, label }) => (
  <Box marginRight={2}>
    <Text color="cyan">[{shortcut}]</Text>
    <Text dimColor> {label}</Text>
  </Box>
);

export const StatusBar: React.FC<StatusBarProps> = ({ pollerState, pollWarning, toast }) => {
  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1}>
      <Box justifyContent="space-between">
        <Box>
          <KeyHint shortcut="1-4" label="Focus" />
          <KeyHint shortcut="c" label="Copy" />
          <KeyHint shortcut="x" label="Excel" />
          <KeyHint shortcut="w" label="Watch" />
          <KeyHint shortcut="s" label="Stop" />
          <KeyHint shortcut="?" label="Help" />
          <KeyHint shortcut="q" label="Quit" />
        </Box>
        <Text color={STATE_COLORS[pollerState]} bold>
          {pollerState.toUpperCase()}
        </Text>
      </Box>
      {(toast || pollWarning) && (
        <Box justifyContent="space-between">
          <Text color={toast ? TONE_COLORS[toast.tone] : 'white'}>{toast?.text ?? ''}</Text>
          {pollWarning && <Text color="yellow" wrap="truncate">⚠ {pollWarning}</Text>}
        </Box>
      )}
    </Box>
  );
};

export default StatusBar;
