/**
 * Batch Runner
 *
 * Input path -> document list -> filters -> endpoint discovery -> dispatch,
 * with every non-empty result merged into the result store as it completes.
 *
 * @module services/pipeline/batch
 */

import * as fs from 'fs';
import * as path from 'path';
import type { AppConfig } from '../../config/schema.js';
import type { DocumentInput, EndpointDescriptor } from '../../models/index.js';
import { formatError, pathNotFoundError } from '../../utils/errors.js';
import { discoverEndpoints } from '../ollama/discovery.js';
import { ResultStore } from '../storage/index.js';
import { SkipFilter } from '../metadata/skip-filter.js';
import { dispatch } from './dispatcher.js';
import { DocumentPipeline, describeResult, type PipelineDependencies } from './document-pipeline.js';

export interface BatchDependencies extends PipelineDependencies {
  /** Endpoint discovery; defaults to probing the configured port range */
  discover?: (config: AppConfig['ollama']) => Promise<EndpointDescriptor[]>;
  store?: ResultStore;
  skipFilter?: SkipFilter;
}

export interface BatchSummary {
  found: number;
  alreadyProcessed: number;
  skippedByMetadata: number;
  processed: number;
  failed: number;
  withAuthors: number;
  authorsWritten: number;
  storeErrors: number;
  endpoints: number;
  workers: number;
}

export function documentKeyFor(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * A single PDF, or every *.pdf directly inside a directory, sorted by name.
 *
 * @throws ExtractionError(PATH_NOT_FOUND)
 */
export function listDocuments(inputPath: string): DocumentInput[] {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(inputPath);
  } catch {
    throw pathNotFoundError(inputPath);
  }

  const files = stat.isDirectory()
    ? fs
        .readdirSync(inputPath)
        .filter((name) => name.toLowerCase().endsWith('.pdf'))
        .sort()
        .map((name) => path.join(inputPath, name))
    : [inputPath];

  return files.map((filePath) => ({ filePath, documentKey: documentKeyFor(filePath) }));
}

function emptySummary(found: number): BatchSummary {
  return {
    found,
    alreadyProcessed: 0,
    skippedByMetadata: 0,
    processed: 0,
    failed: 0,
    withAuthors: 0,
    authorsWritten: 0,
    storeErrors: 0,
    endpoints: 0,
    workers: 0,
  };
}

export async function runBatch(
  inputPath: string,
  config: AppConfig,
  deps: BatchDependencies
): Promise<BatchSummary> {
  let documents = listDocuments(inputPath);
  const summary = emptySummary(documents.length);
  if (documents.length === 0) {
    console.error(`[Batch] No PDF files found in ${inputPath}`);
    return summary;
  }

  const store = deps.store ?? new ResultStore(config.output.csvPath);

  if (config.execution.skipProcessedFiles) {
    try {
      const processed = await store.processedKeys();
      const before = documents.length;
      documents = documents.filter((d) => !processed.has(d.documentKey));
      summary.alreadyProcessed = before - documents.length;
      if (summary.alreadyProcessed > 0) {
        console.error(`[Batch] Skipping ${summary.alreadyProcessed} already processed file(s)`);
      }
    } catch (error) {
      console.error(`[Batch] Could not read processed files: ${formatError(error)}`);
    }
  }

  if (config.features.metadataFiltering) {
    const filter = deps.skipFilter ?? new SkipFilter(config.metadata, config.debug);
    const before = documents.length;
    documents = documents.filter((d) => !filter.shouldSkip(d.filePath));
    summary.skippedByMetadata = before - documents.length;
  }

  if (config.execution.maxFiles > 0 && documents.length > config.execution.maxFiles) {
    console.error(`[Batch] Limiting to ${config.execution.maxFiles} of ${documents.length} file(s)`);
    documents = documents.slice(0, config.execution.maxFiles);
  }

  if (documents.length === 0) {
    console.error('[Batch] No files to process after filtering');
    return summary;
  }

  const discover = deps.discover ?? ((ollama: AppConfig['ollama']) => discoverEndpoints(ollama));
  const endpoints = await discover(config.ollama);
  summary.endpoints = endpoints.length;

  const pipeline = new DocumentPipeline(config, deps);
  const dispatched = await dispatch(
    documents,
    endpoints,
    (document, endpoint) => pipeline.run(document, endpoint),
    {
      maxWorkers: config.ollama.maxWorkers,
      onResult: async ({ document, result }) => {
        if (!result) return;
        console.error(`[Batch] ${document.documentKey}: ${describeResult(result)}`);
        if (result.authors.length === 0) return;

        summary.withAuthors++;
        try {
          await store.merge({ documentKey: document.documentKey, authors: result.authors });
          summary.authorsWritten += result.authors.length;
        } catch (error) {
          summary.storeErrors++;
          console.error(`[Batch] ${formatError(error)}`);
        }
      },
    }
  );

  summary.workers = dispatched.workers;
  summary.processed = dispatched.completed;
  summary.failed = dispatched.failed;
  return summary;
}

export function formatSummary(summary: BatchSummary): string {
  return [
    `Documents found:        ${summary.found}`,
    `Already processed:      ${summary.alreadyProcessed}`,
    `Skipped by metadata:    ${summary.skippedByMetadata}`,
    `Processed:              ${summary.processed} (${summary.workers} worker(s), ${summary.endpoints} endpoint(s))`,
    `Failed:                 ${summary.failed}`,
    `With authors:           ${summary.withAuthors}`,
    `Authors written:        ${summary.authorsWritten}`,
    `Store errors:           ${summary.storeErrors}`,
  ].join('\n');
}
