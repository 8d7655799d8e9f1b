/**
 * Format Command - Pretty-print a SQL statement
 *
 * Takes the statement as an argument, or reads it from stdin.
 */

import { formatQuery } from '../../format/sql-formatter.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export async function formatCommand(sql: string | undefined): Promise<void> {
  const source = sql ?? (process.stdin.isTTY ? '' : await readStdin());
  if (!source.trim()) {
    console.error('  nothing to format: pass a statement or pipe one on stdin');
    process.exitCode = 1;
    return;
  }
  console.log(formatQuery(source));
}
