import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  CatalogLoader,
  derivePartitionedTables,
  externalTableName,
} from '../../../services/templates/CatalogLoader';
import { Logger } from '../../../services/core/Logger';
import { ConfigurationError } from '../../../types/QueryErrors';
import type { QueryDefinition } from '../../../types/QueryTypes';

function ddl(name: string, sqlTemplate: string): QueryDefinition {
  return { name, sqlTemplate, kind: 'DDL', group: 'ddl', sourcePath: `/sql/ddl/${name}.sql` };
}

const outbreaksDdl = ddl(
  'ddl_who_outbreaks',
  'CREATE EXTERNAL TABLE IF NOT EXISTS ${DATABASE}.who_outbreaks (id string)\nPARTITIONED BY (year int)\nSTORED AS PARQUET'
);
const indicatorsDdl = ddl(
  'ddl_who_indicators',
  'CREATE EXTERNAL TABLE `health_db`.`who_indicators` (value double) PARTITIONED BY (indicator_code string, year int)'
);
const flatDdl = ddl('ddl_countries', 'CREATE EXTERNAL TABLE countries (iso3 string) STORED AS PARQUET');
const viewDdl = ddl('ddl_recent_view', 'CREATE OR REPLACE VIEW recent AS SELECT 1');

describe('CatalogLoader', () => {
  describe('externalTableName', () => {
    it('should strip database prefixes, placeholders and quoting', () => {
      expect(externalTableName(outbreaksDdl.sqlTemplate)).toBe('who_outbreaks');
      expect(externalTableName(indicatorsDdl.sqlTemplate)).toBe('who_indicators');
      expect(externalTableName(flatDdl.sqlTemplate)).toBe('countries');
      expect(externalTableName('create external table if not exists $DATABASE.malaria (x int)')).toBe('malaria');
    });

    it('should return null for statements that are not external tables', () => {
      expect(externalTableName(viewDdl.sqlTemplate)).toBeNull();
    });
  });

  describe('derivePartitionedTables', () => {
    it('should keep partitioned tables in DDL order', () => {
      expect(derivePartitionedTables([outbreaksDdl, flatDdl, viewDdl, indicatorsDdl])).toEqual([
        'who_outbreaks',
        'who_indicators',
      ]);
    });
  });

  describe('parse', () => {
    const allDdl = [outbreaksDdl, indicatorsDdl, flatDdl];

    it('should use the listed partitioned tables and skip list', () => {
      const catalog = CatalogLoader.parse(
        'catalog:\n  skip_ddl: [ddl_countries]\n  partitioned_tables:\n    - who_outbreaks\n',
        allDdl
      );

      expect(catalog).toEqual({
        skipDdl: ['ddl_countries'],
        partitionedTables: ['who_outbreaks'],
        partitionSource: 'catalog',
      });
    });

    it('should derive partitioned tables from DDL that is not skipped', () => {
      const catalog = CatalogLoader.parse('catalog:\n  skip_ddl:\n    - ddl_who_indicators\n', allDdl);

      expect(catalog).toEqual({
        skipDdl: ['ddl_who_indicators'],
        partitionedTables: ['who_outbreaks'],
        partitionSource: 'ddl',
      });
    });

    it('should accept an empty file', () => {
      expect(CatalogLoader.parse('', allDdl)).toEqual({
        skipDdl: [],
        partitionedTables: ['who_outbreaks', 'who_indicators'],
        partitionSource: 'ddl',
      });
    });

    it('should reject invalid YAML', () => {
      expect(() => CatalogLoader.parse('catalog: [unclosed', allDdl)).toThrow(ConfigurationError);
    });

    it('should reject table names that are not identifiers', () => {
      expect(() =>
        CatalogLoader.parse('catalog:\n  partitioned_tables: ["who; DROP TABLE x"]\n', allDdl, 'catalog.yaml')
      ).toThrow('Invalid catalog catalog.yaml:\n  - catalog.partitioned_tables.0: table names are bare identifiers');
    });
  });

  describe('load', () => {
    let rootDir: string;

    beforeEach(() => {
      rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-'));
    });

    afterEach(() => {
      fs.rmSync(rootDir, { recursive: true, force: true });
    });

    it('should derive from DDL when there is no catalog file', async () => {
      const catalog = await CatalogLoader.load(rootDir, [outbreaksDdl], new Logger('CatalogLoaderTest'));

      expect(catalog).toEqual({ skipDdl: [], partitionedTables: ['who_outbreaks'], partitionSource: 'ddl' });
    });

    it('should read catalog.yaml from the template root', async () => {
      fs.writeFileSync(path.join(rootDir, 'catalog.yaml'), 'catalog:\n  partitioned_tables: [who_indicators]\n');

      const catalog = await CatalogLoader.load(rootDir, [outbreaksDdl], new Logger('CatalogLoaderTest'));

      expect(catalog.partitionedTables).toEqual(['who_indicators']);
      expect(catalog.partitionSource).toBe('catalog');
    });
  });
});
