import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '../core/Logger';
import { NotFoundError } from '../../types/QueryErrors';
import {
  QueryDefinition,
  QueryKind,
  TemplateGroup,
  TEMPLATE_GROUPS,
} from '../../types/QueryTypes';
import { CatalogLoader, QueryCatalog } from './CatalogLoader';
import { isFileNotFound } from '../../utils/fs-errors';

const KIND_BY_GROUP: Record<TemplateGroup, QueryKind> = {
  ddl: 'DDL',
  queries: 'SELECT',
};

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (error) {
    if (isFileNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * SqlTemplateStore - named SQL definitions read from <root>/ddl and <root>/queries
 *
 * One file is one statement; the file stem is the query name. Definitions are
 * loaded once and frozen. Groups are ordered by file name.
 */
export class SqlTemplateStore {
  private constructor(
    public readonly rootDir: string,
    private readonly groups: ReadonlyMap<TemplateGroup, readonly QueryDefinition[]>,
    public readonly catalog: QueryCatalog
  ) {}

  static async load(rootDir: string, logger: Logger): Promise<SqlTemplateStore> {
    if (!(await isDirectory(rootDir))) {
      throw new NotFoundError(`SQL template directory not found: ${rootDir}`, 'TEMPLATE_DIR_NOT_FOUND');
    }

    const groups = new Map<TemplateGroup, readonly QueryDefinition[]>();
    let foundGroup = false;

    for (const group of TEMPLATE_GROUPS) {
      const groupDir = path.join(rootDir, group);
      if (!(await isDirectory(groupDir))) {
        logger.debug('Template group directory missing, treating as empty', { group, groupDir });
        groups.set(group, []);
        continue;
      }
      foundGroup = true;
      groups.set(group, await SqlTemplateStore.loadGroup(groupDir, group, logger));
    }

    if (!foundGroup) {
      throw new NotFoundError(
        `No ddl/ or queries/ directory found under ${rootDir}`,
        'TEMPLATE_DIR_NOT_FOUND'
      );
    }

    const catalog = await CatalogLoader.load(rootDir, groups.get('ddl') ?? [], logger);

    logger.info('SQL templates loaded', {
      rootDir,
      ddl: groups.get('ddl')?.length ?? 0,
      queries: groups.get('queries')?.length ?? 0,
      partitionedTables: catalog.partitionedTables,
    });

    return new SqlTemplateStore(rootDir, groups, catalog);
  }

  private static async loadGroup(
    groupDir: string,
    group: TemplateGroup,
    logger: Logger
  ): Promise<QueryDefinition[]> {
    const files = (await fs.readdir(groupDir))
      .filter((file) => file.endsWith('.sql'))
      .sort();

    const definitions: QueryDefinition[] = [];
    for (const file of files) {
      const sourcePath = path.join(groupDir, file);
      const sqlTemplate = (await fs.readFile(sourcePath, 'utf8')).trim();
      if (sqlTemplate === '') {
        logger.warn('Skipping empty SQL template', { sourcePath });
        continue;
      }
      definitions.push(
        Object.freeze({
          name: path.basename(file, '.sql'),
          sqlTemplate,
          kind: KIND_BY_GROUP[group],
          group,
          sourcePath,
        })
      );
    }
    return definitions;
  }

  /**
   * Look up a definition by exact name, then by name prefix (first in file order).
   * Without a group, queries are searched before DDL.
   */
  get(name: string, group?: TemplateGroup): QueryDefinition {
    const searchOrder: TemplateGroup[] = group ? [group] : ['queries', 'ddl'];
    const candidates = searchOrder.flatMap((g) => this.list(g));

    const exact = candidates.find((definition) => definition.name === name);
    if (exact) return exact;

    const prefixed = name !== '' ? candidates.find((definition) => definition.name.startsWith(name)) : undefined;
    if (prefixed) return prefixed;

    const available = searchOrder.flatMap((g) => this.names(g));
    throw new NotFoundError(
      `Query not found: ${name}${group ? ` (group ${group})` : ''} under ${this.rootDir}; available: ${available.join(', ') || 'none'}`
    );
  }

  list(group: TemplateGroup): readonly QueryDefinition[] {
    return this.groups.get(group) ?? [];
  }

  names(group: TemplateGroup): string[] {
    return this.list(group).map((definition) => definition.name);
  }
}
