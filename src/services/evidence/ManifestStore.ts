import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Logger } from '../core/Logger';
import { errorMessage } from '../../types/QueryErrors';
import type { IManifestStore, ManifestEntry } from '../../types/QueryTypes';
import { isFileNotFound } from '../../utils/fs-errors';

export const MANIFEST_FILE_NAME = '_manifest.jsonl';

const ManifestEntrySchema = z.object({
  entryId: z.string(),
  queryName: z.string(),
  kind: z.enum(['DDL', 'SELECT']),
  mode: z.enum(['CLOUD', 'LOCAL']),
  status: z.enum(['SUCCEEDED', 'FAILED', 'CANCELLED', 'TIMED_OUT']),
  resultLocation: z.string().nullable(),
  executionId: z.string().optional(),
  rowCount: z.number().optional(),
  startedAt: z.string(),
  endedAt: z.string(),
  durationMs: z.number(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      diagnostic: z.string().optional(),
    })
    .optional(),
}) satisfies z.ZodType<ManifestEntry>;

/**
 * ManifestStore - append-only run manifest
 *
 * One JSON line per executed statement, written to <evidenceDir>/_manifest.jsonl.
 * Entries are never rewritten; the file is only ever opened in append mode.
 */
export class ManifestStore implements IManifestStore {
  private logger: Logger;
  readonly manifestPath: string;

  constructor(logger: Logger, evidenceDir: string) {
    this.logger = logger;
    this.manifestPath = path.join(evidenceDir, MANIFEST_FILE_NAME);
  }

  async append(entry: Omit<ManifestEntry, 'entryId'>): Promise<ManifestEntry> {
    const manifestEntry: ManifestEntry = {
      entryId: `entry-${Date.now()}-${uuidv4()}`,
      ...entry,
    };

    try {
      await fs.mkdir(path.dirname(this.manifestPath), { recursive: true });
      await fs.appendFile(this.manifestPath, `${JSON.stringify(manifestEntry)}\n`, { encoding: 'utf8', flag: 'a' });
    } catch (error) {
      this.logger.error('Failed to append manifest entry', {
        entryId: manifestEntry.entryId,
        queryName: entry.queryName,
        error: errorMessage(error),
      });
      throw error;
    }

    this.logger.debug('Manifest entry appended', {
      entryId: manifestEntry.entryId,
      queryName: entry.queryName,
      status: entry.status,
    });
    return manifestEntry;
  }

  async readAll(): Promise<ManifestEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.manifestPath, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return [];
      }
      throw error;
    }

    return content
      .split('\n')
      .filter((line) => line.trim() !== '')
      .map((line, index) => {
        const invalid = (reason: string) =>
          new Error(`Invalid manifest entry #${index + 1} in ${this.manifestPath}: ${reason}`);

        let raw: unknown;
        try {
          raw = JSON.parse(line);
        } catch (error) {
          throw invalid(errorMessage(error));
        }
        const parsed = ManifestEntrySchema.safeParse(raw);
        if (!parsed.success) {
          throw invalid(parsed.error.message);
        }
        return parsed.data;
      });
  }
}
