/**
 * Session Cursor Tests
 *
 * Positional emission tracking: ranges, no re-emission, resets.
 */

import { describe, it, expect } from 'vitest';
import { SessionCursor, rangeLength } from '../session/cursor.js';

describe('SessionCursor', () => {
  it('should start empty', () => {
    const cursor = new SessionCursor();

    expect(cursor.sessionId).toBeNull();
    expect(cursor.snapshot()).toEqual({ sessionId: null, emittedCount: 0 });
  });

  it('should claim only the newly observed indices', () => {
    const cursor = new SessionCursor('abc');

    expect(cursor.advance(2)).toEqual({ start: 0, end: 2 });
    expect(cursor.advance(5)).toEqual({ start: 2, end: 5 });
    expect(cursor.emittedCount).toBe(5);
  });

  it('should return an empty range when nothing new was observed', () => {
    const cursor = new SessionCursor('abc');
    cursor.advance(3);

    const same = cursor.advance(3);
    const shrunk = cursor.advance(1);

    expect(rangeLength(same)).toBe(0);
    expect(shrunk).toEqual({ start: 3, end: 3 });
    expect(cursor.emittedCount).toBe(3);
  });

  it('should ignore counts that are not whole numbers', () => {
    const cursor = new SessionCursor('abc');

    expect(rangeLength(cursor.advance(2.5))).toBe(0);
    expect(rangeLength(cursor.advance(Number.NaN))).toBe(0);
    expect(cursor.emittedCount).toBe(0);
  });

  it('should start counting from zero after a reset', () => {
    const cursor = new SessionCursor('abc');
    cursor.advance(4);

    cursor.reset('def');

    expect(cursor.snapshot()).toEqual({ sessionId: 'def', emittedCount: 0 });
    expect(cursor.advance(1)).toEqual({ start: 0, end: 1 });
  });
});
