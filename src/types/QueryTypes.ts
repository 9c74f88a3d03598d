/**
 * Query Types - core data model of the query runner
 *
 * A QueryDefinition is loaded once from the template directory and never changes.
 * ExecutionRequest lives for one invocation; ExecutionResult and ManifestEntry
 * are produced once per request and are append-only afterwards.
 */

/**
 * Backing engine: CLOUD runs on Athena, LOCAL runs on an in-memory DuckDB
 */
export type ExecutionMode = 'CLOUD' | 'LOCAL';

export type QueryKind = 'DDL' | 'SELECT';

/**
 * Template groups on disk (sql/ddl, sql/queries)
 */
export type TemplateGroup = 'ddl' | 'queries';

export const TEMPLATE_GROUPS: readonly TemplateGroup[] = ['ddl', 'queries'];

export interface QueryDefinition {
  readonly name: string;
  readonly sqlTemplate: string;
  readonly kind: QueryKind;
  readonly group: TemplateGroup;
  readonly sourcePath: string;
}

export interface ExecutionRequest {
  definition: QueryDefinition;
  renderedSql: string;
  mode: ExecutionMode;
  database: string;
}

/**
 * Lifecycle of one request.
 * PENDING -> SUBMITTED -> POLLING -> terminal (cloud)
 * PENDING -> SUBMITTED -> terminal (local)
 */
export type ExecutionState =
  | 'PENDING'
  | 'SUBMITTED'
  | 'POLLING'
  | 'SUCCEEDED'
  | 'FAILED'
  | 'CANCELLED'
  | 'TIMED_OUT';

export type TerminalState = Extract<ExecutionState, 'SUCCEEDED' | 'FAILED' | 'CANCELLED' | 'TIMED_OUT'>;

const TERMINAL_STATES: readonly TerminalState[] = ['SUCCEEDED', 'FAILED', 'CANCELLED', 'TIMED_OUT'];

const TERMINAL_STATE_SET: ReadonlySet<ExecutionState> = new Set<ExecutionState>(TERMINAL_STATES);

export function isTerminalState(state: ExecutionState): state is TerminalState {
  return TERMINAL_STATE_SET.has(state);
}

/**
 * Status of a result returned to the caller. TIMED_OUT never reaches a result:
 * it surfaces as QueryTimeoutError and is only recorded in the manifest.
 */
export type ExecutionStatus = 'SUCCEEDED' | 'FAILED' | 'CANCELLED';

export interface ExecutionResult {
  queryName: string;
  mode: ExecutionMode;
  status: ExecutionStatus;
  resultLocation: string;
  rowCount?: number;
  executionId?: string;
  startedAt: string;
  endedAt: string;
  durationMs: number;
}

export interface ManifestEntry {
  entryId: string;
  queryName: string;
  kind: QueryKind;
  mode: ExecutionMode;
  status: TerminalState;
  resultLocation: string | null;
  executionId?: string;
  rowCount?: number;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  error?: {
    name: string;
    message: string;
    diagnostic?: string;
  };
}

export interface IManifestStore {
  append(entry: Omit<ManifestEntry, 'entryId'>): Promise<ManifestEntry>;
  readAll(): Promise<ManifestEntry[]>;
}

/**
 * Outcome of ddl-run: DDL results followed by partition repairs
 */
export interface DdlRunResult {
  ddl: ExecutionResult[];
  repairs: ExecutionResult[];
}
