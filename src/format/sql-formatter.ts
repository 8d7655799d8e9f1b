/**
 * SQL display formatter
 *
 * Rule-ordered line breaking for SQL that is about to be shown. Works on raw
 * text: commas inside string literals are split as well.
 */

const CLAUSE_PATTERN =
  /\s+(SELECT|FROM|WHERE|JOIN|INNER JOIN|LEFT JOIN|RIGHT JOIN|GROUP BY|ORDER BY|HAVING|UNION)\s+/gi;
const LIST_COMMA_PATTERN = /,\s*(?=[a-zA-Z_])/g;
const ON_PATTERN = /\s+ON\s+/gi;
const CONDITION_PATTERN = /\s+(AND|OR)\s+/gi;

export function formatQuery(raw: string): string {
  if (!raw) {
    return raw;
  }

  return raw
    .replace(CLAUSE_PATTERN, (_match, keyword: string) => `\n${keyword.toUpperCase()} `)
    .replace(LIST_COMMA_PATTERN, ',\n    ')
    .replace(ON_PATTERN, '\n  ON ')
    .replace(CONDITION_PATTERN, (_match, keyword: string) => `\n    ${keyword.toUpperCase()} `)
    .trim();
}
