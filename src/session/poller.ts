/**
 * Session Poller
 *
 * Drives the transcript of one processing session:
 * - discovers the newest session when no id is known yet
 * - polls the session snapshot on a fixed interval
 * - reveals new interactions through the cursor and the synthesizer
 * - hands off to a newer session while discovery-driven
 * - stops once a final result is seen, or when cancelled
 *
 * All mutation happens on the event loop between awaits. Each round carries a
 * generation number; anything that resolves after the round changed is dropped
 * before it touches the cursor or the transcript.
 */

import type { CursorState, SessionSnapshot, TranscriptEntry } from '../types/index.js';
import { SessionCursor, rangeLength } from './cursor.js';
import { TranscriptSynthesizer, terminalEntry, type PacingOptions } from './transcript.js';

// =============================================================================
// TYPES
// =============================================================================

export type PollerState = 'idle' | 'discovering' | 'polling' | 'completed' | 'cancelled';

/**
 * Read side of the query service the poller needs
 */
export interface SessionSource {
  getLatestSessionId(): Promise<string | null>;
  getSession(sessionId: string): Promise<SessionSnapshot>;
}

export interface PollerLogger {
  debug(message: string): void;
  warn(message: string, error?: unknown): void;
}

export interface SessionPollerOptions {
  source: SessionSource;
  /** Tick period in milliseconds (default: 1000) */
  intervalMs?: number;
  pacing?: Partial<PacingOptions>;
  logger?: PollerLogger;
  now?: () => Date;
}

export type StartOptions =
  | { sessionId: string }
  | { sessionId?: undefined; excludeSessionId?: string | null };

export type TranscriptListener = (entries: readonly TranscriptEntry[]) => void;
export type StateListener = (state: PollerState) => void;

type RoundMode = 'pinned' | 'discovery';

export const DEFAULT_POLL_INTERVAL_MS = 1000;

export const consoleLogger: PollerLogger = {
  debug: (message) => {
    if (process.env.QUERYLENS_DEBUG === 'true') {
      console.debug(`[SessionPoller] ${message}`);
    }
  },
  warn: (message, error) => {
    console.warn(`[SessionPoller] ${message}`, error instanceof Error ? error.message : error ?? '');
  },
};

// =============================================================================
// SESSION POLLER
// =============================================================================

export class SessionPoller {
  private readonly source: SessionSource;
  private readonly intervalMs: number;
  private readonly synthesizer: TranscriptSynthesizer;
  private readonly logger: PollerLogger;
  private readonly now: () => Date;

  private readonly cursor = new SessionCursor();
  private entries: TranscriptEntry[] = [];
  private currentState: PollerState = 'idle';

  private timer: NodeJS.Timeout | null = null;
  private abortController: AbortController | null = null;
  private generation = 0;
  private inFlightGeneration: number | null = null;
  private mode: RoundMode = 'pinned';
  private excludeSessionId: string | null = null;
  /** Sessions this round has already followed; never handed back to */
  private readonly followedSessionIds = new Set<string>();
  private terminalAppended = false;

  private readonly transcriptListeners = new Set<TranscriptListener>();
  private readonly stateListeners = new Set<StateListener>();

  constructor(options: SessionPollerOptions) {
    this.source = options.source;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.synthesizer = new TranscriptSynthesizer(options.pacing);
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
  }

  get state(): PollerState {
    return this.currentState;
  }

  get inProgress(): boolean {
    return this.currentState === 'discovering' || this.currentState === 'polling';
  }

  get transcript(): readonly TranscriptEntry[] {
    return [...this.entries];
  }

  get cursorState(): CursorState {
    return this.cursor.snapshot();
  }

  /**
   * Begin a new round. With a session id the session is polled directly;
   * without one the newest session is discovered first.
   */
  start(options: StartOptions = {}): void {
    this.beginRound();
    this.entries = [];
    this.emitTranscript();

    if (options.sessionId !== undefined) {
      this.mode = 'pinned';
      this.excludeSessionId = null;
      this.cursor.reset(options.sessionId);
      this.setState('polling');
      this.logger.debug(`polling session ${options.sessionId}`);
    } else {
      this.mode = 'discovery';
      this.excludeSessionId = options.excludeSessionId ?? null;
      this.cursor.reset(null);
      this.setState('discovering');
      this.logger.debug('discovering latest session');
    }

    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  /**
   * Stop all activity. Late responses of this round are discarded.
   */
  cancel(): void {
    if (this.currentState === 'idle') {
      return;
    }
    this.endRound();
    if (this.currentState !== 'completed') {
      this.setState('cancelled');
    }
  }

  /**
   * Cancel and forget the transcript
   */
  reset(): void {
    this.endRound();
    this.cursor.reset(null);
    this.entries = [];
    this.emitTranscript();
    this.setState('idle');
  }

  onTranscriptChanged(listener: TranscriptListener): () => void {
    this.transcriptListeners.add(listener);
    return () => {
      this.transcriptListeners.delete(listener);
    };
  }

  onStateChanged(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Round lifecycle
  // ---------------------------------------------------------------------------

  private beginRound(): void {
    this.endRound();
    this.abortController = new AbortController();
    this.terminalAppended = false;
    this.followedSessionIds.clear();
  }

  private endRound(): void {
    this.generation++;
    this.disposeTimer();
    this.abortController?.abort();
    this.abortController = null;
    this.inFlightGeneration = null;
  }

  private disposeTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private isCurrent(generation: number): boolean {
    return generation === this.generation && this.inProgress;
  }

  // ---------------------------------------------------------------------------
  // Ticks
  // ---------------------------------------------------------------------------

  private tick(): void {
    const generation = this.generation;

    // One request per round at a time; the timer keeps running meanwhile
    if (this.inFlightGeneration === generation) {
      return;
    }
    this.inFlightGeneration = generation;

    this.runTick(generation)
      .catch(error => this.logger.warn('tick failed', error))
      .finally(() => {
        if (this.inFlightGeneration === generation) {
          this.inFlightGeneration = null;
        }
      });
  }

  private async runTick(generation: number): Promise<void> {
    if (this.mode === 'discovery') {
      const discovered = await this.discover(generation);
      if (!discovered) {
        return;
      }
    }

    const sessionId = this.cursor.sessionId;
    if (sessionId === null || !this.isCurrent(generation)) {
      return;
    }

    let snapshot: SessionSnapshot;
    try {
      snapshot = await this.source.getSession(sessionId);
    } catch (error) {
      if (this.isCurrent(generation)) {
        this.logger.warn(`failed to fetch session ${sessionId}, retrying next tick`, error);
      }
      return;
    }

    if (!this.isCurrent(generation) || this.cursor.sessionId !== sessionId) {
      return;
    }

    await this.applySnapshot(snapshot, generation);
  }

  /**
   * Look for the newest session; resets the cursor on first discovery and on hand-off.
   * Returns whether a session is known after the lookup.
   */
  private async discover(generation: number): Promise<boolean> {
    let latestId: string | null;
    try {
      latestId = await this.source.getLatestSessionId();
    } catch (error) {
      if (this.isCurrent(generation)) {
        this.logger.warn('failed to look up latest session, retrying next tick', error);
      }
      return false;
    }

    if (!this.isCurrent(generation)) {
      return false;
    }

    if (
      latestId !== null &&
      latestId !== this.excludeSessionId &&
      latestId !== this.cursor.sessionId &&
      !this.followedSessionIds.has(latestId)
    ) {
      const previous = this.cursor.sessionId;
      this.followedSessionIds.add(latestId);
      this.cursor.reset(latestId);
      this.terminalAppended = false;
      this.logger.debug(previous === null
        ? `discovered session ${latestId}`
        : `handing off from session ${previous} to ${latestId}`);
    }

    if (this.cursor.sessionId === null) {
      return false;
    }

    if (this.currentState === 'discovering') {
      this.setState('polling');
    }
    return true;
  }

  private async applySnapshot(snapshot: SessionSnapshot, generation: number): Promise<void> {
    const range = this.cursor.advance(snapshot.interactions.length);
    if (rangeLength(range) > 0) {
      this.logger.debug(`revealing interactions ${range.start}..${range.end - 1} of ${snapshot.sessionId}`);
    }

    const sessionId = this.cursor.sessionId;
    const stillCurrent = () => this.isCurrent(generation) && this.cursor.sessionId === sessionId;

    for (let index = range.start; index < range.end; index++) {
      if (!stillCurrent()) {
        return;
      }
      await this.synthesizer.reveal(snapshot.interactions[index], {
        append: entry => this.append(entry),
        isCurrent: stillCurrent,
        signal: this.abortController?.signal,
        now: this.now,
      });
    }

    if (snapshot.finalResult && stillCurrent() && !this.terminalAppended) {
      this.terminalAppended = true;
      this.append(terminalEntry(snapshot.finalResult, this.now()));
      this.complete();
    }
  }

  private complete(): void {
    this.generation++;
    this.disposeTimer();
    this.abortController = null;
    this.inFlightGeneration = null;
    this.setState('completed');
    this.logger.debug(`session ${this.cursor.sessionId ?? 'unknown'} completed`);
  }

  // ---------------------------------------------------------------------------
  // Notifications
  // ---------------------------------------------------------------------------

  private append(entry: TranscriptEntry): void {
    this.entries.push(entry);
    this.emitTranscript();
  }

  private emitTranscript(): void {
    const copy: readonly TranscriptEntry[] = [...this.entries];
    for (const listener of this.transcriptListeners) {
      listener(copy);
    }
  }

  private setState(state: PollerState): void {
    if (this.currentState === state) {
      return;
    }
    this.currentState = state;
    for (const listener of this.stateListeners) {
      listener(state);
    }
  }
}
