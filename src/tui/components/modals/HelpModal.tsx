/**
 * HelpModal Component
 *
 * Modal showing keyboard shortcuts and help.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { Modal } from './Modal.js';

export interface HelpModalProps {
  apiUrl: string;
  onClose: () => void;
}

const shortcuts = [
  { key: '1-4', action: 'Focus panel 1-4' },
  { key: 'Tab', action: 'Cycle focus forward' },
  { key: 'Enter', action: 'Type a question (panel 1)' },
  { key: 'Esc', action: 'Leave the question input' },
  { key: 'c', action: 'Copy result rows (TSV)' },
  { key: 'x', action: 'Export result rows to Excel' },
  { key: 'w', action: 'Follow the latest session' },
  { key: 's', action: 'Stop following' },
  { key: 'n', action: 'Clear for a new question' },
  { key: 'd', action: 'Check the database' },
  { key: '?', action: 'Show this help' },
  { key: 'q', action: 'Quit / Close modal' },
];

export const HelpModal: React.FC<HelpModalProps> = ({ apiUrl, onClose }) => {
  return (
    <Modal title="Keyboard Shortcuts" onClose={onClose} width={50}>
      <Box flexDirection="column">
        {shortcuts.map(({ key, action }) => (
          <Box key={key}>
            <Box width={12}>
              <Text color="cyan" bold>{key}</Text>
            </Box>
            <Text>{action}</Text>
          </Box>
        ))}
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold>Panels:</Text>
        <Box marginLeft={2} flexDirection="column">
          <Text>[1] Question</Text>
          <Text>[2] Processing steps</Text>
          <Text>[3] Result</Text>
          <Text>[4] Generated SQL</Text>
        </Box>
      </Box>

      <Box marginTop={1}>
        <Text dimColor>Query service: {apiUrl}</Text>
      </Box>
    </Modal>
  );
};

export default HelpModal;
