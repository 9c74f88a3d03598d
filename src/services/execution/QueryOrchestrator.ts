import type { RunnerConfig } from '../../config/runnerConfig';
import {
  QueryExecutionFailedError,
  QueryRunnerError,
  QueryTimeoutError,
  errorMessage,
} from '../../types/QueryErrors';
import type {
  DdlRunResult,
  ExecutionRequest,
  ExecutionResult,
  IManifestStore,
  ManifestEntry,
  QueryDefinition,
  TerminalState,
} from '../../types/QueryTypes';
import { Logger } from '../core/Logger';
import type {
  AsyncQueryEngine,
  PollResult,
  QueryEngine,
  StatementContext,
  SyncQueryEngine,
} from '../engines/IQueryEngine';
import { SqlTemplateStore } from '../templates/SqlTemplateStore';
import { render, variablesFromConfig } from '../templates/TemplateRenderer';
import { ExecutionStateMachine } from './ExecutionStateMachine';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface QueryOrchestratorDeps {
  config: RunnerConfig;
  engine: QueryEngine;
  store: SqlTemplateStore;
  manifest: IManifestStore;
  logger: Logger;
  sleep?: Sleep;
}

/**
 * Public surface used by the CLI and the Lambda handler
 */
export type QueryRunner = Pick<
  QueryOrchestrator,
  'mode' | 'runQuery' | 'runAll' | 'runDdl' | 'repairPartitions' | 'settleCatalog'
>;

interface StatementOutcome {
  resultLocation: string;
  rowCount?: number;
  executionId?: string;
}

interface ExecuteOptions {
  /** Download the result artifact after SUCCEEDED (cloud only) */
  fetchResult: boolean;
}

/**
 * QueryOrchestrator - drives named statements through the configured engine
 *
 * One statement at a time. Every request that reaches the engine ends in exactly
 * one manifest entry, whether it succeeds, fails, is cancelled or times out.
 */
export class QueryOrchestrator {
  private config: RunnerConfig;
  private engine: QueryEngine;
  private store: SqlTemplateStore;
  private manifest: IManifestStore;
  private logger: Logger;
  private sleep: Sleep;

  constructor(deps: QueryOrchestratorDeps) {
    this.config = deps.config;
    this.engine = deps.engine;
    this.store = deps.store;
    this.manifest = deps.manifest;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;

    if (this.engine.mode !== this.config.mode) {
      throw new Error(`Engine mode ${this.engine.mode} does not match configured mode ${this.config.mode}`);
    }
  }

  get mode(): RunnerConfig['mode'] {
    return this.config.mode;
  }

  /**
   * Maximum number of polls before a cloud query is declared timed out
   */
  get maxPolls(): number {
    const { pollIntervalMs, maxWaitSeconds } = this.config.athena;
    return Math.max(1, Math.ceil((maxWaitSeconds * 1000) / pollIntervalMs));
  }

  async runQuery(name: string): Promise<ExecutionResult> {
    const definition = this.store.get(name);
    return this.execute(definition, { fetchResult: true });
  }

  /**
   * Every SELECT template in file order. The first failure aborts the batch.
   */
  async runAll(): Promise<ExecutionResult[]> {
    const definitions = this.store.list('queries');
    const results: ExecutionResult[] = [];

    this.logger.info('Running all queries', { count: definitions.length, mode: this.mode });
    for (const definition of definitions) {
      try {
        results.push(await this.execute(definition, { fetchResult: true }));
      } catch (error) {
        this.logger.error('Batch aborted', {
          failedQuery: definition.name,
          completed: results.length,
          remaining: definitions.length - results.length - 1,
        });
        throw error;
      }
    }
    return results;
  }

  /**
   * Every DDL template except those listed in skip_ddl, then one partition repair
   * per partitioned table once all DDL succeeded.
   */
  async runDdl(): Promise<DdlRunResult> {
    const { skipDdl } = this.store.catalog;
    const ddl: ExecutionResult[] = [];

    for (const definition of this.store.list('ddl')) {
      if (skipDdl.includes(definition.name)) {
        this.logger.info('Skipping DDL listed in skip_ddl', { queryName: definition.name });
        continue;
      }
      ddl.push(await this.execute(definition, { fetchResult: true }));
    }

    const repairs = await this.repairPartitions();
    return { ddl, repairs };
  }

  /**
   * MSCK REPAIR TABLE for each partitioned table. Local views read partitions
   * directly from disk, so there is nothing to repair under LOCAL.
   */
  async repairPartitions(): Promise<ExecutionResult[]> {
    if (this.engine.kind === 'sync') {
      this.logger.info('Partition repair not needed for local engine');
      return [];
    }

    const results: ExecutionResult[] = [];
    for (const table of this.store.catalog.partitionedTables) {
      const definition: QueryDefinition = Object.freeze({
        name: `repair_${table}`,
        sqlTemplate: `MSCK REPAIR TABLE ${this.config.database}.${table}`,
        kind: 'DDL',
        group: 'ddl',
        sourcePath: this.store.catalog.partitionSource === 'catalog' ? 'catalog.yaml' : 'ddl',
      });
      results.push(await this.execute(definition, { fetchResult: false }));
    }
    return results;
  }

  /**
   * Pause so that tables and partitions created by DDL are visible to the queries
   * that follow. Nothing to wait for under LOCAL.
   */
  async settleCatalog(): Promise<void> {
    const { ddlSettleMs } = this.config.athena;
    if (this.engine.kind === 'sync' || ddlSettleMs === 0) {
      return;
    }
    this.logger.info('Waiting for catalog propagation after DDL', { ddlSettleMs });
    await this.sleep(ddlSettleMs);
  }

  private async execute(definition: QueryDefinition, options: ExecuteOptions): Promise<ExecutionResult> {
    const request: ExecutionRequest = {
      definition,
      renderedSql: render(definition.sqlTemplate, variablesFromConfig(this.config), definition.name),
      mode: this.mode,
      database: this.config.database,
    };

    const machine = new ExecutionStateMachine(definition.name, (from, to) =>
      this.logger.debug('State transition', { queryName: definition.name, from, to })
    );
    const startedAt = new Date();

    this.logger.info('Executing statement', {
      queryName: definition.name,
      kind: definition.kind,
      mode: request.mode,
    });

    let executionId: string | undefined;
    const onSubmitted = (id: string): void => {
      executionId = id;
    };
    const outcome = await (this.engine.kind === 'async'
      ? this.runAsync(this.engine, request, machine, options, onSubmitted)
      : this.runSync(this.engine, request, machine)
    ).catch((error: unknown) => this.recordFailure(definition, machine, startedAt, error, executionId));

    const endedAt = new Date();
    const result: ExecutionResult = {
      queryName: definition.name,
      mode: request.mode,
      status: 'SUCCEEDED',
      resultLocation: outcome.resultLocation,
      rowCount: outcome.rowCount,
      executionId: outcome.executionId,
      startedAt: startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: endedAt.getTime() - startedAt.getTime(),
    };

    await this.record(definition, {
      status: 'SUCCEEDED',
      resultLocation: outcome.resultLocation,
      executionId: outcome.executionId,
      rowCount: outcome.rowCount,
      startedAt,
      endedAt,
    });

    this.logger.info('Statement succeeded', {
      queryName: definition.name,
      executionId: result.executionId,
      resultLocation: result.resultLocation,
      rowCount: result.rowCount,
      durationMs: result.durationMs,
    });
    return result;
  }

  private async runAsync(
    engine: AsyncQueryEngine,
    request: ExecutionRequest,
    machine: ExecutionStateMachine,
    options: ExecuteOptions,
    onSubmitted: (executionId: string) => void
  ): Promise<StatementOutcome> {
    const context = this.statementContext(request);
    const errorContext = { queryName: request.definition.name, mode: request.mode };

    let executionId: string;
    try {
      executionId = await engine.submit(request.renderedSql, context);
    } catch (error) {
      throw this.asRunnerError(error, request.definition.name);
    }
    onSubmitted(executionId);
    machine.transition('SUBMITTED');
    machine.transition('POLLING');

    const maxPolls = this.maxPolls;
    for (let attempt = 1; attempt <= maxPolls; attempt++) {
      let poll: PollResult;
      try {
        poll = await engine.poll(executionId);
      } catch (error) {
        throw this.asRunnerError(error, request.definition.name, executionId);
      }

      this.logger.debug('Polled execution', { queryName: context.queryName, executionId, attempt, state: poll.state });

      if (poll.state === 'SUCCEEDED') {
        let resultLocation = engine.outputLocation;
        let rowCount: number | undefined;
        if (options.fetchResult) {
          const fetched = await engine.fetch(executionId, context);
          resultLocation = fetched.resultLocation;
          rowCount = fetched.rowCount;
        }
        machine.transition('SUCCEEDED');
        return { resultLocation, rowCount, executionId };
      }

      if (poll.state === 'FAILED' || poll.state === 'CANCELLED') {
        machine.transition(poll.state);
        throw new QueryExecutionFailedError(
          `Query ${context.queryName} ${poll.state}`,
          { ...errorContext, executionId, diagnostic: poll.reason },
          poll.state === 'CANCELLED' ? 'QUERY_CANCELLED' : 'QUERY_FAILED'
        );
      }

      if (attempt < maxPolls) {
        await this.sleep(this.config.athena.pollIntervalMs);
      }
    }

    machine.transition('TIMED_OUT');
    await this.cancelQuietly(engine, context.queryName, executionId);
    throw new QueryTimeoutError({ ...errorContext, executionId }, this.config.athena.maxWaitSeconds * 1000);
  }

  private async runSync(
    engine: SyncQueryEngine,
    request: ExecutionRequest,
    machine: ExecutionStateMachine
  ): Promise<StatementOutcome> {
    machine.transition('SUBMITTED');
    const local = await engine.execute(request.renderedSql, this.statementContext(request));
    machine.transition('SUCCEEDED');
    return { resultLocation: local.resultLocation, rowCount: local.rowCount };
  }

  private async cancelQuietly(engine: AsyncQueryEngine, queryName: string, executionId: string): Promise<void> {
    if (!engine.cancel) {
      return;
    }
    try {
      await engine.cancel(executionId);
      this.logger.info('Stop requested for timed out query', { queryName, executionId });
    } catch (error) {
      this.logger.warn('Failed to stop timed out query', { queryName, executionId, error: errorMessage(error) });
    }
  }

  private statementContext(request: ExecutionRequest): StatementContext {
    return {
      queryName: request.definition.name,
      kind: request.definition.kind,
      database: request.database,
    };
  }

  private asRunnerError(error: unknown, queryName: string, executionId?: string): QueryRunnerError {
    if (error instanceof QueryRunnerError) {
      return error;
    }
    return new QueryExecutionFailedError(
      `Query ${queryName} failed`,
      { queryName, mode: this.mode, executionId, diagnostic: errorMessage(error) },
      this.engine.kind === 'sync' ? 'LOCAL_EXECUTION_FAILED' : 'QUERY_FAILED',
      error
    );
  }

  private async recordFailure(
    definition: QueryDefinition,
    machine: ExecutionStateMachine,
    startedAt: Date,
    error: unknown,
    executionId?: string
  ): Promise<never> {
    const failure = this.asRunnerError(error, definition.name, executionId);
    const status = machine.settleFailure();

    await this.record(definition, {
      status,
      resultLocation: null,
      executionId,
      startedAt,
      endedAt: new Date(),
      error: {
        name: failure.name,
        message: failure.message,
        diagnostic: failure instanceof QueryExecutionFailedError ? failure.diagnostic : undefined,
      },
    });

    this.logger.error('Statement did not succeed', {
      queryName: definition.name,
      status,
      executionId,
      transitions: machine.transitions.join(' -> '),
      error_code: failure.error_code,
      error: failure.message,
    });
    throw failure;
  }

  private async record(
    definition: QueryDefinition,
    entry: {
      status: TerminalState;
      resultLocation: string | null;
      executionId?: string;
      rowCount?: number;
      startedAt: Date;
      endedAt: Date;
      error?: ManifestEntry['error'];
    }
  ): Promise<void> {
    await this.manifest.append({
      queryName: definition.name,
      kind: definition.kind,
      mode: this.mode,
      status: entry.status,
      resultLocation: entry.resultLocation,
      executionId: entry.executionId,
      rowCount: entry.rowCount,
      startedAt: entry.startedAt.toISOString(),
      endedAt: entry.endedAt.toISOString(),
      durationMs: entry.endedAt.getTime() - entry.startedAt.getTime(),
      error: entry.error,
    });
  }
}
