/**
 * querylens Shared Types
 *
 * Domain types shared by the session engine, the query controller and both
 * front ends. Wire (snake_case) shapes live next to the client in
 * clients/query-service/schemas.ts and never leak past it.
 */

// =============================================================================
// SESSIONS
// =============================================================================

/**
 * One step taken by the remote pipeline. Identity is positional.
 */
export interface InteractionRecord {
  agent: string;
  input: string;
  output: string;
}

/**
 * Terminal marker of a session. No errorMessage means success.
 */
export interface FinalResult {
  errorMessage?: string;
}

/**
 * Read-only copy of a remote session as last fetched
 */
export interface SessionSnapshot {
  sessionId: string;
  interactions: InteractionRecord[];
  finalResult: FinalResult | null;
}

/**
 * How many interactions of the active session are already in the transcript
 */
export interface CursorState {
  sessionId: string | null;
  emittedCount: number;
}

// =============================================================================
// TRANSCRIPT
// =============================================================================

export type TranscriptEntryKind = 'user' | 'agent' | 'error' | 'success';

export interface TranscriptEntry {
  id: string;
  kind: TranscriptEntryKind;
  label: string;
  text: string;
  producedAt: Date;
}

// =============================================================================
// QUERIES
// =============================================================================

export type ResultRow = Record<string, unknown>;

export type ErrorCategory =
  | 'database_connection'
  | 'sql_generation'
  | 'timeout'
  | 'validation'
  | 'processing'
  | 'unknown';

export interface QuerySuccess {
  ok: true;
  message: string;
  sql: string;
  formattedSql: string;
  rows: ResultRow[];
  debugInfo: Record<string, unknown> | null;
}

export interface QueryApplicationFailure {
  ok: false;
  failure: 'application';
  category: ErrorCategory;
  message: string;
  hint: string;
  details: string | null;
}

export interface QueryTransportFailure {
  ok: false;
  failure: 'transport';
  message: string;
  hint: string;
}

export type QueryOutcome = QuerySuccess | QueryApplicationFailure | QueryTransportFailure;

export type NoticeTone = 'success' | 'info' | 'warning' | 'error';

/**
 * Short, transient notification shown after an action
 */
export interface Notice {
  tone: NoticeTone;
  text: string;
}

// =============================================================================
// DATABASE CHECK
// =============================================================================

export interface DatabaseInfo {
  database: string;
  host: string;
  port: number | string;
}

export interface DatabaseCheck {
  success: boolean;
  message: string;
  connectionTime: number | null;
  databaseInfo: DatabaseInfo | null;
}

export interface HealthStatus {
  status: string;
  timestamp: string | null;
}
