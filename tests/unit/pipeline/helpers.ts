/**
 * In-process stand-ins for the PDF and inference adapters.
 *
 * Rendered "images" are the UTF-8 bytes of `<documentKey>:<pageIndex>`, so
 * a fake model can answer per page.
 */

import * as path from 'path';
import { vi } from 'vitest';
import type { AuthorRecord } from '../../../src/models/author.js';
import type { InferenceClient } from '../../../src/services/ollama/client.js';
import type { PageRenderer } from '../../../src/services/pdf/renderer.js';
import type { TextExtractor } from '../../../src/services/pdf/text.js';
import type { PipelineDependencies } from '../../../src/services/pipeline/document-pipeline.js';
import { RenderError } from '../../../src/utils/errors.js';

export interface FakeDocument {
  pages: number;
  text?: string;
  /** Page index -> model reply */
  replies?: Record<number, AuthorRecord[]>;
  /** Page indices whose rendering fails */
  brokenPages?: number[];
}

function keyOf(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export function fakeDependencies(documents: Record<string, FakeDocument>) {
  const lookup = (filePath: string): FakeDocument => documents[keyOf(filePath)] ?? { pages: 1 };

  const renderer: PageRenderer = {
    pageCount: vi.fn(async (filePath: string) => lookup(filePath).pages),
    render: vi.fn(async (filePath: string, pageIndex: number) => {
      if (lookup(filePath).brokenPages?.includes(pageIndex)) {
        throw new RenderError(`cannot render page ${pageIndex}`);
      }
      return Buffer.from(`${keyOf(filePath)}:${pageIndex}`);
    }),
  };

  const textExtractor: TextExtractor = {
    extract: vi.fn(async (filePath: string) => lookup(filePath).text ?? ''),
  };

  const infer = vi.fn<InferenceClient['infer']>(async (_endpoint, _prompt, image) => {
    const [key, page] = image.toString('utf-8').split(':');
    return documents[key]?.replies?.[Number(page)] ?? [];
  });
  const inference: InferenceClient = { infer };

  const deps: PipelineDependencies = { renderer, textExtractor, inference };
  return { deps, infer };
}
