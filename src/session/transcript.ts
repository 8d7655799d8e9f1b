/**
 * Transcript Synthesizer
 *
 * Turns interaction records into display entries and paces their reveal so
 * the transcript reads like live generation.
 */

import type {
  FinalResult,
  InteractionRecord,
  TranscriptEntry,
  TranscriptEntryKind,
} from '../types/index.js';

export const INPUT_TEXT_LIMIT = 500;
export const OUTPUT_TEXT_LIMIT = 1000;
export const ELLIPSIS = '...';

export const INPUT_PAUSE_MS = 300;
export const OUTPUT_PAUSE_MS = 600;

export const SYSTEM_LABEL = 'System';
export const COMPLETION_MESSAGE = 'Processing complete.';

const AGENT_DISPLAY_NAMES: Record<string, string> = {
  schema_analyst: 'Schema Analyst',
  query_planner: 'Query Planner',
  sql_developer: 'SQL Developer',
  sql_executor: 'SQL Executor',
  quality_validator: 'Quality Validator',
};

/**
 * Human-readable name for a pipeline stage; unknown ids pass through
 */
export function displayName(agent: string): string {
  return AGENT_DISPLAY_NAMES[agent.toLowerCase()] ?? agent;
}

export function truncate(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}${ELLIPSIS}`;
}

let entrySequence = 0;

function createEntry(
  kind: TranscriptEntryKind,
  label: string,
  text: string,
  producedAt: Date
): TranscriptEntry {
  entrySequence += 1;
  return {
    id: `${kind}-${producedAt.getTime()}-${entrySequence}`,
    kind,
    label,
    text,
    producedAt,
  };
}

/**
 * Entries for one record: input first, then output, each only when non-blank
 */
export function synthesizeEntries(record: InteractionRecord, now: Date = new Date()): TranscriptEntry[] {
  const entries: TranscriptEntry[] = [];
  const name = displayName(record.agent);

  if (record.input.trim()) {
    entries.push(createEntry('user', `Input to ${name}`, truncate(record.input, INPUT_TEXT_LIMIT), now));
  }

  if (record.output.trim()) {
    entries.push(createEntry('agent', name, truncate(record.output, OUTPUT_TEXT_LIMIT), now));
  }

  return entries;
}

/**
 * The single closing entry of a session
 */
export function terminalEntry(finalResult: FinalResult, now: Date = new Date()): TranscriptEntry {
  if (finalResult.errorMessage !== undefined) {
    return createEntry('error', SYSTEM_LABEL, finalResult.errorMessage, now);
  }
  return createEntry('success', SYSTEM_LABEL, COMPLETION_MESSAGE, now);
}

/**
 * Resolves after ms, or as soon as the signal aborts
 */
export function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface PacingOptions {
  inputPauseMs: number;
  outputPauseMs: number;
}

export interface RevealContext {
  append: (entry: TranscriptEntry) => void;
  /** Checked before every append; false stops the reveal */
  isCurrent: () => boolean;
  signal?: AbortSignal;
  now?: () => Date;
}

export class TranscriptSynthesizer {
  private readonly pacing: PacingOptions;

  constructor(pacing: Partial<PacingOptions> = {}) {
    this.pacing = {
      inputPauseMs: pacing.inputPauseMs ?? INPUT_PAUSE_MS,
      outputPauseMs: pacing.outputPauseMs ?? OUTPUT_PAUSE_MS,
    };
  }

  /**
   * Append the entries of one record, pausing after each.
   * Returns the number of entries appended.
   */
  async reveal(record: InteractionRecord, context: RevealContext): Promise<number> {
    const now = context.now ?? (() => new Date());
    const entries = synthesizeEntries(record, now());
    let appended = 0;

    for (const entry of entries) {
      if (!context.isCurrent()) {
        break;
      }

      context.append({ ...entry, producedAt: now() });
      appended++;

      const ms = entry.kind === 'user' ? this.pacing.inputPauseMs : this.pacing.outputPauseMs;
      await pause(ms, context.signal);
    }

    return appended;
  }
}
