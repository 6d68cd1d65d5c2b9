/**
 * Ollama Inference Client
 *
 * POSTs one rendered page plus a prompt to an Ollama /api/generate endpoint
 * and coerces the reply into author records.
 *
 * Failure handling:
 * - connection errors and 5xx responses are retried with backoff
 * - a timeout raises InferError(INFERENCE_TIMEOUT) and is not retried
 * - an unparseable model reply yields [] rather than an error
 *
 * @module services/ollama/client
 */

import { z } from 'zod';
import type { AuthorRecord } from '../../models/author.js';
import type { EndpointDescriptor } from '../../models/endpoint.js';
import type { RetryConfig } from '../../config/schema.js';
import { InferError, formatError } from '../../utils/errors.js';
import { withRetry } from '../../utils/backoff.js';
import { parseAuthorPayload } from '../authors/coerce.js';

/** Contract the document pipeline depends on; tests substitute fakes. */
export interface InferenceClient {
  infer(
    endpoint: EndpointDescriptor,
    prompt: string,
    image: Buffer,
    timeoutMs: number
  ): Promise<AuthorRecord[]>;
}

export interface OllamaClientOptions {
  retry?: Partial<RetryConfig>;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

const GenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
  eval_duration: z.number().optional(),
});

function isRetryable(error: unknown): boolean {
  return error instanceof InferError && !error.isTimeout && error.details?.retryable === true;
}

export class OllamaClient implements InferenceClient {
  private readonly fetchImpl: typeof fetch;
  private readonly retry: Partial<RetryConfig>;

  constructor(options: OllamaClientOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retry = options.retry ?? {};
  }

  async infer(
    endpoint: EndpointDescriptor,
    prompt: string,
    image: Buffer,
    timeoutMs: number
  ): Promise<AuthorRecord[]> {
    const body = JSON.stringify({
      model: endpoint.modelName,
      prompt,
      images: [image.toString('base64')],
      stream: false,
      format: 'json',
    });

    const text = await withRetry(
      () => this.generate(endpoint, body, timeoutMs),
      isRetryable,
      this.retry,
      `Ollama ${endpoint.address}`
    );
    return parseAuthorPayload(text, `response from ${endpoint.address}`);
  }

  private async generate(
    endpoint: EndpointDescriptor,
    body: string,
    timeoutMs: number
  ): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(endpoint.address, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body,
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new InferError(
            `Ollama request to ${endpoint.address} timed out after ${timeoutMs}ms`,
            { endpoint: endpoint.address, timeoutMs },
            'INFERENCE_TIMEOUT'
          );
        }
        throw new InferError(`Ollama request to ${endpoint.address} failed: ${formatError(error)}`, {
          endpoint: endpoint.address,
          retryable: true,
        });
      }

      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new InferError(
          `Ollama returned HTTP ${response.status} from ${endpoint.address}: ${detail.slice(0, 200)}`,
          { endpoint: endpoint.address, status: response.status, retryable: response.status >= 500 }
        );
      }

      const payload: unknown = await response.json().catch(() => undefined);
      const parsed = GenerateResponseSchema.safeParse(payload);
      if (!parsed.success) {
        console.error(`[OllamaClient] Unexpected response shape from ${endpoint.address}`);
        return '';
      }
      return parsed.data.response;
    } finally {
      clearTimeout(timer);
    }
  }
}
