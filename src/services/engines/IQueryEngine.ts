/**
 * Query engine adapters.
 *
 * CLOUD engines are asynchronous: submit returns a handle at once and the
 * orchestrator polls it. LOCAL engines execute synchronously and either return
 * rows or throw. The orchestrator narrows on `kind`.
 */

import type { QueryKind } from '../../types/QueryTypes';

export interface StatementContext {
  queryName: string;
  kind: QueryKind;
  database: string;
}

export type EngineState = 'QUEUED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'CANCELLED';

export interface PollResult {
  state: EngineState;
  /** Engine diagnostic for FAILED/CANCELLED */
  reason?: string;
}

export interface FetchResult {
  resultLocation: string;
  rowCount?: number;
}

export interface LocalExecutionResult {
  resultLocation: string;
  rowCount: number;
  columns: string[];
}

export interface AsyncQueryEngine {
  readonly kind: 'async';
  readonly mode: 'CLOUD';
  /** Where the engine writes raw results (used as result location when nothing is fetched) */
  readonly outputLocation: string;
  submit(sql: string, context: StatementContext): Promise<string>;
  poll(executionId: string): Promise<PollResult>;
  fetch(executionId: string, context: StatementContext): Promise<FetchResult>;
  cancel?(executionId: string): Promise<void>;
}

export interface SyncQueryEngine {
  readonly kind: 'sync';
  readonly mode: 'LOCAL';
  execute(sql: string, context: StatementContext): Promise<LocalExecutionResult>;
}

export type QueryEngine = AsyncQueryEngine | SyncQueryEngine;
