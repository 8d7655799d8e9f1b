/**
 * Panel Component
 *
 * Bordered box with a title, hotkey and optional status on the right.
 */

import React from 'react';
import { Box, Text } from 'ink';

export interface PanelProps {
  title: string;
  hotkey: string;
  focused?: boolean;
  status?: React.ReactNode;
  children: React.ReactNode;
  width?: string | number;
  flexGrow?: number;
}

export const Panel: React.FC<PanelProps> = ({
  title,
  hotkey,
  focused = false,
  status,
  children,
  width,
  flexGrow = 1,
}) => {
  return (
    <Box
      flexDirection="column"
      borderStyle={focused ? 'bold' : 'single'}
      borderColor={focused ? 'cyan' : 'gray'}
      paddingX={1}
      width={width}
      flexGrow={flexGrow}
      flexBasis={0}
    >
      <Box justifyContent="space-between" marginBottom={1}>
        <Text bold color={focused ? 'cyan' : 'white'}>
          {title}
        </Text>
        <Box>
          {status}
          <Text dimColor> [{hotkey}]</Text>
        </Box>
      </Box>

      <Box flexDirection="column" flexGrow={1}>
        {children}
      </Box>
    </Box>
  );
};

export default Panel;
