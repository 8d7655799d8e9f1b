/**
 * Header Component
 *
 * Title line with the service address and database status.
 */

import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { DatabaseStatus } from '../../context/AppContext.js';

export interface HeaderProps {
  apiUrl: string;
  database: DatabaseStatus;
  version?: string;
}

const DatabaseBadge: React.FC<{ database: DatabaseStatus }> = ({ database }) => {
  switch (database.phase) {
    case 'unknown':
      return <Text dimColor>db: not checked</Text>;
    case 'checking':
      return <Text color="yellow"><Spinner type="dots" /> db: checking</Text>;
    case 'unreachable':
      return <Text color="red">● db: server unreachable</Text>;
    case 'done': {
      const { check } = database;
      if (!check.success) {
        return <Text color="red">● db: {check.message}</Text>;
      }
      const target = check.databaseInfo
        ? ` ${check.databaseInfo.database}@${check.databaseInfo.host}:${check.databaseInfo.port}`
        : '';
      const time = check.connectionTime !== null ? ` (${check.connectionTime}s)` : '';
      return <Text color="green">● db: connected{target}{time}</Text>;
    }
  }
};

export const Header: React.FC<HeaderProps> = ({ apiUrl, database, version = '0.1.0' }) => {
  return (
    <Box borderStyle="double" borderColor="cyan" paddingX={1} justifyContent="space-between">
      <Box>
        <Text color="cyan" bold>QUERYLENS</Text>
        <Text dimColor> v{version}</Text>
        <Text dimColor> │ </Text>
        <Text>natural language → SQL</Text>
      </Box>
      <Box>
        <Text dimColor>{apiUrl}</Text>
        <Text dimColor> │ </Text>
        <DatabaseBadge database={database} />
      </Box>
    </Box>
  );
};

export default Header;
