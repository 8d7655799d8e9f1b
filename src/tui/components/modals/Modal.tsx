/**
 * Modal Component
 *
 * Centered overlay box. ESC, q or ? closes it.
 */

import React, { useMemo } from 'react';
import { Box, Text, useInput, useStdout } from 'ink';

export interface ModalProps {
  title: string;
  onClose: () => void;
  children: React.ReactNode;
  width?: number;
}

export const Modal: React.FC<ModalProps> = ({ title, onClose, children, width = 50 }) => {
  const { stdout } = useStdout();

  useInput((input, key) => {
    if (key.escape || input === 'q' || input === '?') {
      onClose();
    }
  });

  const termWidth = stdout.columns || 80;
  const termHeight = stdout.rows || 24;
  const boxWidth = Math.min(width, termWidth - 2);

  const blankRows = useMemo(
    () => Array.from({ length: termHeight }, (_, row) => row),
    [termHeight]
  );
  const blankLine = ' '.repeat(termWidth);

  return (
    <>
      {/* Blank out the dashboard underneath */}
      <Box position="absolute" flexDirection="column" width={termWidth} height={termHeight}>
        {blankRows.map(row => (
          <Text key={row}>{blankLine}</Text>
        ))}
      </Box>

      <Box
        position="absolute"
        flexDirection="column"
        marginLeft={Math.max(0, Math.floor((termWidth - boxWidth) / 2))}
        marginTop={Math.max(1, Math.floor(termHeight / 6))}
        width={boxWidth}
        borderStyle="round"
        borderColor="cyan"
        paddingX={1}
      >
        <Box justifyContent="space-between" marginBottom={1}>
          <Text bold color="cyan">{title}</Text>
          <Text dimColor>[ESC]</Text>
        </Box>
        {children}
      </Box>
    </>
  );
};

export default Modal;
