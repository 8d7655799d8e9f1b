/**
 * TranscriptPanel Component
 *
 * Tail of the processing transcript, newest entry last.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { TranscriptEntry, TranscriptEntryKind } from '../../../types/index.js';

export interface TranscriptPanelProps {
  entries: readonly TranscriptEntry[];
  maxEntries: number;
}

const KIND_STYLES: Record<TranscriptEntryKind, { color: string; icon: string }> = {
  user: { color: 'blue', icon: '→' },
  agent: { color: 'green', icon: '◆' },
  error: { color: 'red', icon: '✗' },
  success: { color: 'green', icon: '✓' },
};

function formatTime(date: Date): string {
  return date.toLocaleTimeString('en-GB', { hour12: false });
}

function firstLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export const TranscriptPanel: React.FC<TranscriptPanelProps> = ({ entries, maxEntries }) => {
  if (entries.length === 0) {
    return <Text dimColor>No processing steps yet.</Text>;
  }

  const hidden = Math.max(0, entries.length - maxEntries);
  const visible = entries.slice(hidden);

  return (
    <Box flexDirection="column">
      {hidden > 0 && <Text dimColor>… {hidden} earlier</Text>}
      {visible.map(entry => {
        const style = KIND_STYLES[entry.kind];
        return (
          <Box key={entry.id}>
            <Box width={10}>
              <Text dimColor>{formatTime(entry.producedAt)}</Text>
            </Box>
            <Box width={28}>
              <Text color={style.color} wrap="truncate">
                {style.icon} {entry.label}
              </Text>
            </Box>
            <Box flexGrow={1}>
              <Text wrap="truncate">{firstLine(entry.text)}</Text>
            </Box>
          </Box>
        );
      })}
    </Box>
  );
};

export default TranscriptPanel;
