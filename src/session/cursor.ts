/**
 * Session Cursor
 *
 * Counts how many interactions of the active session have already been
 * turned into transcript entries. The count is the only thing that decides
 * re-emission: the service may legitimately repeat identical steps, so
 * records are never compared by content.
 */

import type { CursorState } from '../types/index.js';

/**
 * Half-open index range [start, end) of newly revealed interactions
 */
export interface EmissionRange {
  start: number;
  end: number;
}

export function rangeLength(range: EmissionRange): number {
  return range.end - range.start;
}

export class SessionCursor {
  private currentSessionId: string | null;
  private emitted = 0;

  constructor(sessionId: string | null = null) {
    this.currentSessionId = sessionId;
  }

  get sessionId(): string | null {
    return this.currentSessionId;
  }

  get emittedCount(): number {
    return this.emitted;
  }

  /**
   * Claim every index between the emitted count and observedCount.
   * A count at or below the emitted count yields an empty range.
   */
  advance(observedCount: number): EmissionRange {
    if (!Number.isInteger(observedCount) || observedCount <= this.emitted) {
      return { start: this.emitted, end: this.emitted };
    }

    const range = { start: this.emitted, end: observedCount };
    this.emitted = observedCount;
    return range;
  }

  /**
   * Point at another session and start counting from zero
   */
  reset(sessionId: string | null): void {
    this.currentSessionId = sessionId;
    this.emitted = 0;
  }

  snapshot(): CursorState {
    return { sessionId: this.currentSessionId, emittedCount: this.emitted };
  }
}
