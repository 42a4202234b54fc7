/**
 * Report writers
 *
 * CSV and JSON persistence of a SweepResult under the output directory.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { LoadTestError, describeError } from '../api/errors.js';
import type { SweepResult } from '../types/index.js';
import {
  OUTCOME_COLUMNS,
  SUMMARY_COLUMNS,
  reportBaseName,
  toOutcomeRows,
  toSummaryRows,
} from './records.js';

export type ReportFormat = 'csv' | 'json';

export interface WriteReportsOptions {
  directory: string;
  formats: readonly ReportFormat[];
  concurrencyLevels: readonly number[];
  endpointType: string;
  /** Write the per-request rows as well (needs runs on the result) */
  includeOutcomes: boolean;
  date?: Date;
  logger?: Logger;
}

function escapeCsvValue(value: unknown): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Render rows as CSV with a header line
 */
export function toCsv<Row>(
  rows: readonly Row[],
  columns: ReadonlyArray<keyof Row & string>
): string {
  const lines = [columns.join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvValue(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Write every configured report and return the paths written
 */
export async function writeReports(result: SweepResult, options: WriteReportsOptions): Promise<string[]> {
  const baseName = reportBaseName(options.concurrencyLevels, options.date ?? new Date());
  const written: string[] = [];

  const files: Array<{ name: string; contents: string }> = [];
  if (options.formats.includes('csv')) {
    files.push({ name: `${baseName}_summary.csv`, contents: toCsv(toSummaryRows(result), SUMMARY_COLUMNS) });
    if (options.includeOutcomes) {
      files.push({
        name: `${baseName}_raw.csv`,
        contents: toCsv(toOutcomeRows(result.runs, options.endpointType), OUTCOME_COLUMNS),
      });
    }
  }
  if (options.formats.includes('json')) {
    const payload = options.includeOutcomes ? result : { ...result, runs: [] };
    files.push({ name: `${baseName}.json`, contents: `${JSON.stringify(payload, null, 2)}\n` });
  }

  try {
    await mkdir(options.directory, { recursive: true });
    for (const file of files) {
      const path = join(options.directory, file.name);
      await writeFile(path, file.contents, 'utf8');
      written.push(path);
      options.logger?.info({ path }, 'Report saved');
    }
  } catch (error) {
    throw new LoadTestError('ReportError', `Failed to write reports: ${describeError(error)}`, {
      directory: options.directory,
    });
  }

  return written;
}
