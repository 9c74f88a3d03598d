import * as fs from 'fs/promises';
import * as path from 'path';
import type { DuckDbRows } from './DuckDbClient';

export interface ResultExportOptions {
  json: boolean;
  csv: boolean;
}

function csvCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(result: DuckDbRows): string {
  const lines = [result.columns.map(csvCell).join(',')];
  for (const row of result.rows) {
    lines.push(result.columns.map((column) => csvCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Write a local result set into the evidence directory as <baseName>.json and/or
 * <baseName>.csv. Existing files are never overwritten. Returns the written paths.
 */
export async function writeLocalResult(
  evidenceDir: string,
  baseName: string,
  result: DuckDbRows,
  options: ResultExportOptions
): Promise<string[]> {
  const written: string[] = [];
  if (!options.json && !options.csv) {
    return written;
  }
  await fs.mkdir(evidenceDir, { recursive: true });

  if (options.json) {
    const jsonPath = path.join(evidenceDir, `${baseName}.json`);
    await fs.writeFile(jsonPath, JSON.stringify(result.rows, null, 2), { encoding: 'utf8', flag: 'wx' });
    written.push(jsonPath);
  }
  if (options.csv) {
    const csvPath = path.join(evidenceDir, `${baseName}.csv`);
    await fs.writeFile(csvPath, toCsv(result), { encoding: 'utf8', flag: 'wx' });
    written.push(csvPath);
  }
  return written;
}
