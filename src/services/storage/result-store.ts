/**
 * Result Store
 *
 * One CSV row per document:
 *
 *   filename, author_1_name, author_1_title, author_1_email, author_2_name, ...
 *
 * The table is only ever widened. Its width in author slots is
 * max(MIN_AUTHOR_SLOTS, authors in the incoming row, slots already on disk);
 * when it grows, existing rows are padded with empty cells. A row for an
 * existing key replaces that row in place.
 *
 * Every merge is a whole-file read-modify-write. Merges on one store
 * instance are queued so concurrent workers never overwrite each other.
 *
 * @module services/storage/result-store
 */

import * as fs from 'fs';
import * as path from 'path';
import type { AuthorRecord, ResultRow } from '../../models/author.js';
import { StoreError, formatError } from '../../utils/errors.js';
import { formatCsv, parseCsv, type CsvRow } from './csv.js';

export const MIN_AUTHOR_SLOTS = 5;
export const KEY_COLUMN = 'filename';
const FIELDS_PER_AUTHOR = 3;

export function buildHeader(slots: number): CsvRow {
  const header: CsvRow = [KEY_COLUMN];
  for (let i = 1; i <= slots; i++) {
    header.push(`author_${i}_name`, `author_${i}_title`, `author_${i}_email`);
  }
  return header;
}

/**
 * Author slots a header or row of `columns` cells spans.
 */
export function slotsForWidth(columns: number): number {
  return Math.ceil(Math.max(0, columns - 1) / FIELDS_PER_AUTHOR);
}

function padRow(row: readonly string[], width: number): CsvRow {
  const padded = [...row];
  while (padded.length < width) padded.push('');
  return padded;
}

export function rowCells(key: string, authors: readonly AuthorRecord[], width: number): CsvRow {
  const cells: CsvRow = [key];
  for (const author of authors) {
    cells.push(author.name, author.title, author.email);
  }
  return padRow(cells, width);
}

/**
 * Merge a result into an in-memory table (header first). Pure.
 *
 * @param existing - Current table rows, or [] for a new table
 */
export function mergeRow(existing: readonly (readonly string[])[], result: ResultRow): CsvRow[] {
  const [existingHeader, ...dataRows] = existing;
  const existingSlots = dataRows.reduce(
    (widest, row) => Math.max(widest, slotsForWidth(row.length)),
    existingHeader ? slotsForWidth(existingHeader.length) : 0
  );
  const slots = Math.max(MIN_AUTHOR_SLOTS, result.authors.length, existingSlots);
  const header = buildHeader(slots);
  const width = header.length;

  const newRow = rowCells(result.documentKey, result.authors, width);
  let replaced = false;
  const rows = dataRows.map((row) => {
    if (!replaced && row[0] === result.documentKey) {
      replaced = true;
      return newRow;
    }
    return padRow(row, width);
  });
  if (!replaced) rows.push(newRow);

  return [header, ...rows];
}

export class ResultStore {
  readonly csvPath: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(csvPath: string) {
    this.csvPath = path.resolve(csvPath);
  }

  /**
   * Current table rows including the header; [] when the file does not exist.
   *
   * @throws StoreError if the file exists but cannot be read
   */
  async readTable(): Promise<CsvRow[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.csvPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new StoreError(`Cannot read result table ${this.csvPath}: ${formatError(error)}`, {
        csvPath: this.csvPath,
      });
    }
    return parseCsv(text);
  }

  /**
   * Merge one document's result. Resolves after the file is written;
   * calls are applied one at a time in call order.
   *
   * @throws StoreError
   */
  merge(result: ResultRow): Promise<void> {
    const run = this.queue.then(() => this.mergeNow(result));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async mergeNow(result: ResultRow): Promise<void> {
    const table = mergeRow(await this.readTable(), result);
    try {
      await fs.promises.mkdir(path.dirname(this.csvPath), { recursive: true });
      await fs.promises.writeFile(this.csvPath, formatCsv(table), 'utf-8');
    } catch (error) {
      throw new StoreError(`Cannot write result table ${this.csvPath}: ${formatError(error)}`, {
        csvPath: this.csvPath,
        documentKey: result.documentKey,
      });
    }
  }

  /**
   * Document keys already present in the table.
   */
  async processedKeys(): Promise<Set<string>> {
    const [, ...rows] = await this.readTable();
    return new Set(rows.map((row) => row[0]).filter((key) => key));
  }
}
