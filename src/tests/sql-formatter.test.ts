/**
 * SQL Formatter Tests
 */

import { describe, it, expect } from 'vitest';
import { formatQuery } from '../format/sql-formatter.js';

describe('formatQuery', () => {
  it('should break clauses, select lists and conditions onto their own lines', () => {
    expect(formatQuery('SELECT a,b FROM t WHERE x=1 AND y=2')).toBe(
      'SELECT a,\n    b\nFROM t\nWHERE x=1\n    AND y=2'
    );
  });

  it('should indent join conditions', () => {
    expect(formatQuery('SELECT u.id FROM users u LEFT JOIN orders o ON o.user_id = u.id')).toBe(
      'SELECT u.id\nFROM users u\nLEFT JOIN orders o\n  ON o.user_id = u.id'
    );
  });

  it('should upper-case keywords it breaks on', () => {
    expect(formatQuery('select id from users where a = 1 or b = 2')).toBe(
      'select id\nFROM users\nWHERE a = 1\n    OR b = 2'
    );
  });

  it('should leave empty input alone', () => {
    expect(formatQuery('')).toBe('');
  });

  it('should not change its own output', () => {
    const once = formatQuery(
      'SELECT name, COUNT(*) FROM users JOIN orders ON orders.user_id = users.id GROUP BY name ORDER BY name'
    );

    expect(formatQuery(once)).toBe(once);
  });
});
