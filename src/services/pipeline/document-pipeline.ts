/**
 * Document Pipeline
 *
 * One document, one endpoint, pages in order:
 *
 *   supporting text -> classification -> page selection
 *     -> per page: render -> prompt -> infer -> clean
 *     -> consolidation
 *
 * A page that fails to render or infer contributes no authors; the rest of
 * the document continues. Failures outside the page loop propagate to the
 * dispatcher.
 *
 * @module services/pipeline/document-pipeline
 */

import type { AppConfig } from '../../config/schema.js';
import type {
  AuthorRecord,
  AuthorSource,
  DocumentClassification,
  DocumentInput,
  EndpointDescriptor,
} from '../../models/index.js';
import { ExtractionError, RenderError } from '../../utils/errors.js';
import { classifyDocument } from '../classification/classifier.js';
import { describeSelection, selectPages } from '../pages/selector.js';
import { buildPrompt } from '../ollama/prompts.js';
import type { InferenceClient } from '../ollama/client.js';
import type { PageRenderer } from '../pdf/renderer.js';
import type { TextExtractor } from '../pdf/text.js';
import { cleanAuthorList, consolidateAuthors, extractAuthorsFromText } from '../authors/index.js';

export interface PipelineDependencies {
  renderer: PageRenderer;
  textExtractor: TextExtractor;
  inference: InferenceClient;
}

export interface DocumentResult {
  document: DocumentInput;
  authors: AuthorRecord[];
  source: AuthorSource;
  classification: DocumentClassification;
  totalPages: number;
  pagesProcessed: number;
  pagesFailed: number;
}

type PageOutcome = { ok: true; authors: AuthorRecord[] } | { ok: false; error: ExtractionError };

export class DocumentPipeline {
  constructor(
    private readonly config: AppConfig,
    private readonly deps: PipelineDependencies
  ) {}

  async run(document: DocumentInput, endpoint: EndpointDescriptor): Promise<DocumentResult> {
    const { config } = this;
    const tag = `[Pipeline] ${document.documentKey}:`;

    const supportingText = await this.deps.textExtractor.extract(
      document.filePath,
      config.pdf.supportPages
    );
    const classification = classifyDocument(supportingText, config.features);
    if (classification.docType !== 'standard') {
      console.error(`${tag} detected document type ${classification.docType}`);
    }
    if (classification.institution) {
      console.error(`${tag} detected institution ${classification.institution} (${classification.institutionDomain})`);
    }

    const textAuthors = extractAuthorsFromText(supportingText, classification);
    if (textAuthors.length > 0 && config.debug) {
      console.error(`${tag} ${textAuthors.length} author(s) matched text patterns`);
    }

    let totalPages = 0;
    try {
      totalPages = await this.deps.renderer.pageCount(document.filePath);
    } catch (error) {
      if (!(error instanceof RenderError)) throw error;
      console.error(`${tag} cannot open pages [${error.category}]: ${error.message}`);
    }
    const pages = selectPages(totalPages, config.pdf.pageSelection);
    console.error(
      `${tag} ${describeSelection(totalPages, config.pdf.pageSelection, pages)} via ${endpoint.address}`
    );

    const pageAuthors = new Map<number, AuthorRecord[]>();
    let pagesFailed = 0;
    for (const pageIndex of pages) {
      const outcome = await this.processPage(document, endpoint, {
        pageIndex,
        totalPages,
        supportingText,
        classification,
      });
      if (!outcome.ok) {
        pagesFailed++;
        console.error(`${tag} page ${pageIndex + 1} skipped [${outcome.error.category}]: ${outcome.error.message}`);
        continue;
      }
      pageAuthors.set(pageIndex, outcome.authors);
      if (config.debug) {
        console.error(`${tag} page ${pageIndex + 1}: ${outcome.authors.length} candidate author(s)`);
      }
    }

    const { authors, source } = consolidateAuthors(pageAuthors, textAuthors, classification, {
      features: config.features,
      debug: config.debug,
      label: document.documentKey,
    });

    return {
      document,
      authors,
      source,
      classification,
      totalPages,
      pagesProcessed: pages.length - pagesFailed,
      pagesFailed,
    };
  }

  private async processPage(
    document: DocumentInput,
    endpoint: EndpointDescriptor,
    context: {
      pageIndex: number;
      totalPages: number;
      supportingText: string;
      classification: DocumentClassification;
    }
  ): Promise<PageOutcome> {
    const { config } = this;
    try {
      const image = await this.deps.renderer.render(
        document.filePath,
        context.pageIndex,
        config.pdf.imageScale
      );
      const prompt = buildPrompt(context, config.prompts);
      const raw = await this.deps.inference.infer(endpoint, prompt, image, config.ollama.timeoutMs);
      return { ok: true, authors: cleanAuthorList(raw, { debug: config.debug }) };
    } catch (error) {
      const wrapped = ExtractionError.fromUnknown(error);
      if (wrapped.category === 'INTERNAL_ERROR') {
        throw error;
      }
      return { ok: false, error: wrapped };
    }
  }
}

export function describeResult(result: DocumentResult): string {
  const names = result.authors.map((a) => a.name).join('; ');
  return result.authors.length > 0
    ? `${result.authors.length} author(s) from ${result.source.replace('_', ' ')}: ${names}`
    : `no authors (${result.pagesProcessed}/${result.pagesProcessed + result.pagesFailed} page(s) processed)`;
}
