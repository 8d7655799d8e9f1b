/**
 * ResultPanel Component
 *
 * Outcome of the last question: a preview table on success, the hint and
 * technical details on failure.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { QueryOutcome, ResultRow } from '../../../types/index.js';
import { cellText, columnsOf } from '../../../export/table-export.js';

export interface ResultPanelProps {
  outcome: QueryOutcome | null;
  maxRows?: number;
}

const MAX_CELL_WIDTH = 18;

function clip(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

const RowTable: React.FC<{ rows: ResultRow[]; maxRows: number }> = ({ rows, maxRows }) => {
  const columns = columnsOf(rows);
  const widths = columns.map(column => {
    const longest = rows.slice(0, maxRows).reduce(
      (max, row) => Math.max(max, cellText(row[column]).length),
      column.length
    );
    return Math.min(longest, MAX_CELL_WIDTH) + 2;
  });

  return (
    <Box flexDirection="column">
      <Box>
        {columns.map((column, i) => (
          <Box key={column} width={widths[i]}>
            <Text bold color="cyan">{clip(column, MAX_CELL_WIDTH)}</Text>
          </Box>
        ))}
      </Box>
      {rows.slice(0, maxRows).map((row, rowIndex) => (
        <Box key={rowIndex}>
          {columns.map((column, i) => (
            <Box key={column} width={widths[i]}>
              <Text>{clip(cellText(row[column]), MAX_CELL_WIDTH)}</Text>
            </Box>
          ))}
        </Box>
      ))}
      {rows.length > maxRows && (
        <Text dimColor>… {rows.length - maxRows} more rows ([c] copy all, [x] export)</Text>
      )}
    </Box>
  );
};

export const ResultPanel: React.FC<ResultPanelProps> = ({ outcome, maxRows = 8 }) => {
  if (!outcome) {
    return <Text dimColor>Results appear here once the query finishes.</Text>;
  }

  if (!outcome.ok) {
    return (
      <Box flexDirection="column">
        <Text color="red">✗ {outcome.message}</Text>
        <Box marginTop={1} flexDirection="column">
          <Text bold>Hint</Text>
          <Text>{outcome.hint}</Text>
        </Box>
        {outcome.failure === 'application' && outcome.details && (
          <Box marginTop={1} flexDirection="column">
            <Text bold>Technical details</Text>
            <Text dimColor wrap="truncate-end">{outcome.details}</Text>
          </Box>
        )}
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      <Text color="green">✓ {outcome.message}</Text>
      <Box marginTop={1}>
        {outcome.rows.length === 0
          ? <Text dimColor>The query returned no rows.</Text>
          : <RowTable rows={outcome.rows} maxRows={maxRows} />}
      </Box>
    </Box>
  );
};

export default ResultPanel;
