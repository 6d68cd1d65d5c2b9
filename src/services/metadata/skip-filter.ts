/**
 * Metadata Skip Filter
 *
 * Looks a document up in an external metadata CSV (document_id, headline)
 * and skips it when the headline contains a skip term. Any lookup failure
 * means "process the document".
 *
 * @module services/metadata/skip-filter
 */

import * as fs from 'fs';
import type { MetadataConfig } from '../../config/schema.js';
import { formatError } from '../../utils/errors.js';
import { parseCsv } from '../storage/csv.js';

/** document id -> lower-cased headline */
export type MetadataTable = ReadonlyMap<string, string>;

export type SkipDecision =
  | { skip: false; reason: 'no_id' | 'not_in_metadata' | 'no_match' }
  | { skip: true; term: string };

function normalizeId(id: string): string {
  const trimmed = id.trim();
  return /^\d+$/.test(trimmed) ? `key_${trimmed}` : trimmed;
}

/**
 * Parse metadata CSV text. Requires `document_id` and `headline` columns;
 * other columns are ignored.
 */
export function parseMetadataCsv(text: string): Map<string, string> {
  const [header, ...rows] = parseCsv(text);
  const table = new Map<string, string>();
  if (!header) return table;

  const idColumn = header.findIndex((h) => h.trim() === 'document_id');
  const headlineColumn = header.findIndex((h) => h.trim() === 'headline');
  if (idColumn === -1 || headlineColumn === -1) {
    console.error('[SkipFilter] Metadata CSV needs document_id and headline columns');
    return table;
  }

  for (const row of rows) {
    const id = row[idColumn];
    if (id) table.set(normalizeId(id), (row[headlineColumn] ?? '').toLowerCase());
  }
  return table;
}

/**
 * Document id from a filename via the configured pattern's first group,
 * as `key_<group>`. Undefined when the pattern does not match.
 */
export function extractDocumentId(filename: string, pattern: string): string | undefined {
  const basename = filename.split(/[\\/]/).pop() ?? filename;
  const match = new RegExp(pattern).exec(basename);
  const group = match?.[1];
  return group ? `key_${group}` : undefined;
}

export function decideSkip(
  filename: string,
  table: MetadataTable,
  config: Pick<MetadataConfig, 'skipTerms' | 'idExtractionPattern'>
): SkipDecision {
  const id = extractDocumentId(filename, config.idExtractionPattern);
  if (!id) return { skip: false, reason: 'no_id' };

  const headline = table.get(id);
  if (headline === undefined) return { skip: false, reason: 'not_in_metadata' };

  const lowered = headline.toLowerCase();
  const term = config.skipTerms.find((t) => t && lowered.includes(t.toLowerCase()));
  return term ? { skip: true, term } : { skip: false, reason: 'no_match' };
}

/**
 * Skip filter bound to one metadata file. The table is read on first use
 * and kept for the life of the instance.
 */
export class SkipFilter {
  private table: MetadataTable | undefined;

  constructor(
    private readonly config: MetadataConfig,
    private readonly debug = false
  ) {}

  loadTable(): MetadataTable {
    if (this.table) return this.table;

    if (!this.config.csvPath) {
      console.error('[SkipFilter] No metadata CSV configured; nothing will be skipped');
      this.table = new Map();
      return this.table;
    }

    try {
      this.table = parseMetadataCsv(fs.readFileSync(this.config.csvPath, 'utf-8'));
      console.error(`[SkipFilter] Loaded metadata for ${this.table.size} document(s) from ${this.config.csvPath}`);
    } catch (error) {
      console.error(`[SkipFilter] Error loading metadata CSV ${this.config.csvPath}: ${formatError(error)}`);
      this.table = new Map();
    }
    return this.table;
  }

  shouldSkip(filename: string): boolean {
    const decision = decideSkip(filename, this.loadTable(), this.config);
    if (decision.skip) {
      console.error(`[SkipFilter] Skipping ${filename}: "${decision.term}" found in headline`);
    } else if (this.debug && decision.reason !== 'no_match') {
      console.error(`[SkipFilter] ${filename}: ${decision.reason.replace(/_/g, ' ')}`);
    }
    return decision.skip;
  }
}
