/**
 * Concurrent Dispatcher
 *
 * Document i is bound to endpoint i mod K for its whole run. A pool of
 * min(K, documents, maxWorkers) workers pulls documents off a shared queue;
 * each worker finishes one document before taking the next, so endpoints
 * see at most one document per worker at a time.
 *
 * A document that throws is logged and reported with zero authors. Results
 * reach `onResult` in completion order.
 *
 * @module services/pipeline/dispatcher
 */

import type { DocumentInput } from '../../models/document.js';
import type { EndpointDescriptor } from '../../models/endpoint.js';
import { PipelineError, formatError } from '../../utils/errors.js';

export interface DispatchOutcome<R> {
  document: DocumentInput;
  endpoint: EndpointDescriptor;
  /** Pipeline result; undefined when the document failed */
  result?: R;
  error?: PipelineError;
}

export interface DispatchOptions<R> {
  maxWorkers: number;
  /** Awaited before the worker takes its next document */
  onResult?: (outcome: DispatchOutcome<R>) => Promise<void> | void;
}

export interface DispatchSummary {
  workers: number;
  completed: number;
  failed: number;
}

export type DocumentProcessor<R> = (
  document: DocumentInput,
  endpoint: EndpointDescriptor
) => Promise<R>;

export function workerCount(endpoints: number, documents: number, maxWorkers: number): number {
  return Math.max(0, Math.min(endpoints, documents, maxWorkers));
}

/**
 * Endpoint a document is bound to.
 */
export function assignEndpoint(
  documentIndex: number,
  endpoints: readonly EndpointDescriptor[]
): EndpointDescriptor {
  return endpoints[documentIndex % endpoints.length];
}

export async function dispatch<R>(
  documents: readonly DocumentInput[],
  endpoints: readonly EndpointDescriptor[],
  processor: DocumentProcessor<R>,
  options: DispatchOptions<R>
): Promise<DispatchSummary> {
  if (endpoints.length === 0) {
    throw new PipelineError('No inference endpoints available');
  }

  const workers = workerCount(endpoints.length, documents.length, options.maxWorkers);
  const summary: DispatchSummary = { workers, completed: 0, failed: 0 };
  let next = 0;

  const runWorker = async (workerId: number): Promise<void> => {
    while (next < documents.length) {
      const index = next++;
      const document = documents[index];
      const endpoint = assignEndpoint(index, endpoints);

      let outcome: DispatchOutcome<R>;
      try {
        const result = await processor(document, endpoint);
        outcome = { document, endpoint, result };
        summary.completed++;
      } catch (error) {
        const failure = new PipelineError(
          `Failed to process ${document.documentKey}: ${formatError(error)}`,
          { documentKey: document.documentKey, endpoint: endpoint.address, workerId }
        );
        console.error(`[Dispatcher] ${failure.message}`);
        outcome = { document, endpoint, error: failure };
        summary.failed++;
      }

      if (options.onResult) {
        try {
          await options.onResult(outcome);
        } catch (error) {
          console.error(`[Dispatcher] Result handler failed for ${document.documentKey}: ${formatError(error)}`);
        }
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, (_, i) => runWorker(i)));
  return summary;
}

