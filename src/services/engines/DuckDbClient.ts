/**
 * DuckDB client surface used by the LOCAL engine:
 * - run a statement without reading results
 * - run a query and read every row
 *
 * NodeDuckDbClient binds it to @duckdb/node-api. The native module is loaded on
 * first use, so code paths that never touch LOCAL mode never load it.
 */

import type { DuckDBConnection } from '@duckdb/node-api';

export interface DuckDbRows {
  columns: string[];
  rows: Record<string, unknown>[];
}

export interface DuckDbClient {
  run(sql: string): Promise<void>;
  query(sql: string): Promise<DuckDbRows>;
}

export class NodeDuckDbClient implements DuckDbClient {
  private connection: Promise<DuckDBConnection> | null = null;

  constructor(private readonly databasePath: string = ':memory:') {}

  private connect(): Promise<DuckDBConnection> {
    if (!this.connection) {
      this.connection = import('@duckdb/node-api').then(async ({ DuckDBInstance }) => {
        const instance = await DuckDBInstance.create(this.databasePath);
        return instance.connect();
      });
    }
    return this.connection;
  }

  async run(sql: string): Promise<void> {
    const connection = await this.connect();
    await connection.run(sql);
  }

  async query(sql: string): Promise<DuckDbRows> {
    const connection = await this.connect();
    const reader = await connection.runAndReadAll(sql);
    return {
      columns: reader.columnNames(),
      rows: reader.getRowObjectsJson(),
    };
  }
}
