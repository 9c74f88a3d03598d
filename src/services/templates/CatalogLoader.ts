/**
 * Catalog Loader
 *
 * Reads the optional catalog.yaml next to the SQL template groups:
 *
 *   catalog:
 *     skip_ddl: [ddl_who_indicators]
 *     partitioned_tables: [who_outbreaks, malaria_incidence]
 *
 * When partitioned_tables is absent it is derived from the DDL templates.
 */

import * as yaml from 'js-yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from '../core/Logger';
import { ConfigurationError, errorMessage } from '../../types/QueryErrors';
import type { QueryDefinition } from '../../types/QueryTypes';
import { isFileNotFound } from '../../utils/fs-errors';

export const CATALOG_FILE_NAME = 'catalog.yaml';

export interface QueryCatalog {
  skipDdl: string[];
  partitionedTables: string[];
  /** 'catalog' when listed in catalog.yaml, 'ddl' when derived from PARTITIONED BY clauses */
  partitionSource: 'catalog' | 'ddl';
}

const tableName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'table names are bare identifiers');

const CatalogFileSchema = z.object({
  catalog: z
    .object({
      skip_ddl: z.array(z.string().min(1)).default([]),
      partitioned_tables: z.array(tableName).optional(),
    })
    .default({}),
});

const EXTERNAL_TABLE_PATTERN =
  /CREATE\s+EXTERNAL\s+TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?[`"]?(?:[\w${}]+[`"]?\.[`"]?)?([A-Za-z_][\w]*)[`"]?/i;

/**
 * Table name of a CREATE EXTERNAL TABLE statement, without its database prefix
 */
export function externalTableName(sql: string): string | null {
  const match = EXTERNAL_TABLE_PATTERN.exec(sql);
  return match?.[1] ?? null;
}

/**
 * Partitioned external tables declared by a set of DDL templates, in DDL order
 */
export function derivePartitionedTables(ddl: readonly QueryDefinition[]): string[] {
  const tables: string[] = [];
  for (const definition of ddl) {
    const table = externalTableName(definition.sqlTemplate);
    if (table && /\bPARTITIONED\s+BY\b/i.test(definition.sqlTemplate) && !tables.includes(table)) {
      tables.push(table);
    }
  }
  return tables;
}

export class CatalogLoader {
  static async load(rootDir: string, ddl: readonly QueryDefinition[], logger: Logger): Promise<QueryCatalog> {
    const catalogPath = path.join(rootDir, CATALOG_FILE_NAME);

    let content: string | null = null;
    try {
      content = await fs.readFile(catalogPath, 'utf8');
    } catch (error) {
      if (!isFileNotFound(error)) {
        throw error;
      }
    }

    if (content === null) {
      logger.debug('No catalog file, deriving partitioned tables from DDL', { catalogPath });
      return { skipDdl: [], partitionedTables: derivePartitionedTables(ddl), partitionSource: 'ddl' };
    }

    return CatalogLoader.parse(content, ddl, catalogPath);
  }

  static parse(content: string, ddl: readonly QueryDefinition[], source: string = CATALOG_FILE_NAME): QueryCatalog {
    let raw: unknown;
    try {
      raw = yaml.load(content) ?? {};
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${source}`, [errorMessage(error)]);
    }

    const parsed = CatalogFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid catalog ${source}`,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    const { skip_ddl, partitioned_tables } = parsed.data.catalog;
    const skipDdl = skip_ddl;
    const remainingDdl = ddl.filter((definition) => !skipDdl.includes(definition.name));

    return partitioned_tables
      ? { skipDdl, partitionedTables: partitioned_tables, partitionSource: 'catalog' }
      : { skipDdl, partitionedTables: derivePartitionedTables(remainingDdl), partitionSource: 'ddl' };
  }
}
