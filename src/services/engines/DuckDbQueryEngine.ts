import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/Logger';
import { QueryExecutionFailedError, errorMessage } from '../../types/QueryErrors';
import { externalTableName } from '../templates/CatalogLoader';
import { DuckDbClient, DuckDbRows, NodeDuckDbClient } from './DuckDbClient';
import { translateAthenaToDuckDb } from './SqlDialectTranslator';
import { ResultExportOptions, writeLocalResult } from './ResultWriter';
import type { LocalExecutionResult, StatementContext, SyncQueryEngine } from './IQueryEngine';
import { isFileNotFound } from '../../utils/fs-errors';

export interface DuckDbEngineOptions {
  database: string;
  localDataDir: string;
  evidenceDir: string;
  export: ResultExportOptions;
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * View over every Parquet file below a dataset directory, with year=... style
 * directories exposed as columns
 */
export function datasetViewSql(database: string, table: string, datasetDir: string): string {
  const glob = path.join(datasetDir, '**', '*.parquet');
  return (
    `CREATE OR REPLACE VIEW ${quoteIdentifier(database)}.${quoteIdentifier(table)} AS ` +
    `SELECT * FROM read_parquet(${quoteLiteral(glob)}, hive_partitioning = true)`
  );
}

/**
 * DuckDbQueryEngine - LOCAL adapter
 *
 * Runs Athena-flavoured SQL against local Parquet files in an in-memory DuckDB.
 * Each dataset directory under localDataDir becomes <database>."<dir>", so the
 * cloud templates resolve the same table names locally.
 */
export class DuckDbQueryEngine implements SyncQueryEngine {
  readonly kind = 'sync' as const;
  readonly mode = 'LOCAL' as const;

  private logger: Logger;
  private options: DuckDbEngineOptions;
  private client: DuckDbClient;
  private prepared: Promise<string[]> | null = null;

  constructor(logger: Logger, options: DuckDbEngineOptions, client: DuckDbClient = new NodeDuckDbClient()) {
    this.logger = logger;
    this.options = options;
    this.client = client;

    if (!options.export.json && !options.export.csv) {
      this.logger.warn('Both JSON and CSV exports are disabled; local results will not be persisted');
    }
  }

  /**
   * Create the schema and register dataset views, once per engine
   */
  registerDatasets(): Promise<string[]> {
    if (!this.prepared) {
      this.prepared = this.doRegisterDatasets();
    }
    return this.prepared;
  }

  private async doRegisterDatasets(): Promise<string[]> {
    const { database, localDataDir } = this.options;
    await this.client.run(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(database)}`);

    let entries: string[];
    try {
      const dirents = await fs.readdir(localDataDir, { withFileTypes: true });
      entries = dirents.filter((d) => d.isDirectory()).map((d) => d.name).sort();
    } catch (error) {
      if (isFileNotFound(error)) {
        this.logger.warn('Local data directory not found; no datasets registered', { localDataDir });
        return [];
      }
      throw error;
    }

    const registered: string[] = [];
    for (const name of entries) {
      try {
        await this.client.run(datasetViewSql(database, name, path.join(localDataDir, name)));
        registered.push(name);
      } catch (error) {
        this.logger.warn('Dataset not registered', { dataset: name, error: errorMessage(error) });
      }
    }

    this.logger.info('Registered local datasets', { database, datasets: registered });
    return registered;
  }

  async execute(sql: string, context: StatementContext): Promise<LocalExecutionResult> {
    const errorContext = { queryName: context.queryName, mode: this.mode };

    try {
      await this.registerDatasets();
    } catch (error) {
      throw new QueryExecutionFailedError(
        'Failed to prepare local DuckDB database',
        { ...errorContext, diagnostic: errorMessage(error) },
        'LOCAL_EXECUTION_FAILED',
        error
      );
    }

    if (context.kind === 'DDL') {
      return this.executeDdl(sql, context);
    }

    const translated = translateAthenaToDuckDb(sql);
    if (translated !== sql) {
      this.logger.debug('SQL translated to DuckDB syntax', { queryName: context.queryName });
    }

    let result: DuckDbRows;
    try {
      result = await this.client.query(translated);
    } catch (error) {
      this.logger.debug('Local query failed', { queryName: context.queryName, sql: translated.slice(0, 500) });
      throw new QueryExecutionFailedError(
        `Local query ${context.queryName} failed`,
        { ...errorContext, diagnostic: errorMessage(error) },
        'LOCAL_EXECUTION_FAILED',
        error
      );
    }

    let written: string[];
    try {
      written = await writeLocalResult(
        this.options.evidenceDir,
        `${context.queryName}-${uuidv4()}`,
        result,
        this.options.export
      );
    } catch (error) {
      throw new QueryExecutionFailedError(
        `Failed to write local result for ${context.queryName}`,
        { ...errorContext, diagnostic: errorMessage(error) },
        'RESULT_FETCH_FAILED',
        error
      );
    }

    return {
      resultLocation: written[0] ?? `memory://${context.queryName}`,
      rowCount: result.rows.length,
      columns: result.columns,
    };
  }

  /**
   * External tables have no DuckDB equivalent: they become views over the local
   * dataset directory of the same name. Other DDL (views) runs as written.
   */
  private async executeDdl(sql: string, context: StatementContext): Promise<LocalExecutionResult> {
    const table = externalTableName(sql);
    const statement = table
      ? datasetViewSql(context.database, table, path.join(this.options.localDataDir, table))
      : translateAthenaToDuckDb(sql);

    try {
      await this.client.run(statement);
    } catch (error) {
      throw new QueryExecutionFailedError(
        `Local DDL ${context.queryName} failed`,
        { queryName: context.queryName, mode: this.mode, diagnostic: errorMessage(error) },
        'LOCAL_EXECUTION_FAILED',
        error
      );
    }

    return { resultLocation: `memory://${context.queryName}`, rowCount: 0, columns: [] };
  }
}
