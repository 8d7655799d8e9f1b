/**
 * SqlPanel Component
 *
 * The generated SQL, pretty-printed for reading.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { QueryOutcome } from '../../../types/index.js';

const CLAUSE_LINE = /^(SELECT|FROM|WHERE|JOIN|INNER JOIN|LEFT JOIN|RIGHT JOIN|GROUP BY|ORDER BY|HAVING|UNION)\b/;

export const SqlPanel: React.FC<{ outcome: QueryOutcome | null; visible: boolean }> = ({ outcome, visible }) => {
  if (!visible) {
    return <Text dimColor>SQL display is off (querylens config showSql true).</Text>;
  }
  if (!outcome?.ok || !outcome.formattedSql) {
    return <Text dimColor>No SQL yet.</Text>;
  }

  return (
    <Box flexDirection="column">
      {outcome.formattedSql.split('\n').map((line, i) => (
        <Text key={i} color={CLAUSE_LINE.test(line) ? 'magenta' : undefined}>
          {line}
        </Text>
      ))}
    </Box>
  );
};

export default SqlPanel;
