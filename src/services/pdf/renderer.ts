/**
 * Page Renderer
 *
 * Rasterises single PDF pages to JPEG with pdf.js, drawing onto an
 * @napi-rs/canvas surface. Both install from the npm registry alone.
 *
 * @module services/pdf/renderer
 */

import * as fs from 'fs';
import * as path from 'path';
import { createRequire } from 'module';
import { createCanvas } from '@napi-rs/canvas';
import { getDocument, type PDFDocumentProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { RenderError, formatError } from '../../utils/errors.js';

export const JPEG_QUALITY = 90;

export interface PageRenderer {
  /** Number of pages in the document. */
  pageCount(filePath: string): Promise<number>;
  /**
   * Render one 0-based page to a JPEG buffer.
   * @throws RenderError
   */
  render(filePath: string, pageIndex: number, scale: number): Promise<Buffer>;
}

/**
 * Directory of the standard font files shipped with pdfjs-dist, used for
 * PDFs that reference the base-14 fonts without embedding them.
 */
function standardFontDataUrl(): string | undefined {
  try {
    const require = createRequire(import.meta.url);
    const root = path.dirname(require.resolve('pdfjs-dist/package.json'));
    return path.join(root, 'standard_fonts') + path.sep;
  } catch (error) {
    console.error(`[PageRenderer] pdfjs-dist standard fonts not found: ${formatError(error)}`);
    return undefined;
  }
}

export class PdfjsPageRenderer implements PageRenderer {
  private readonly fontDataUrl = standardFontDataUrl();

  private async withDocument<T>(
    filePath: string,
    fn: (document: PDFDocumentProxy) => Promise<T>
  ): Promise<T> {
    const data = new Uint8Array(await fs.promises.readFile(filePath));
    const document = await getDocument({
      data,
      verbosity: 0,
      standardFontDataUrl: this.fontDataUrl,
    }).promise;
    try {
      return await fn(document);
    } finally {
      await document.destroy();
    }
  }

  async pageCount(filePath: string): Promise<number> {
    try {
      return await this.withDocument(filePath, async (document) => document.numPages);
    } catch (error) {
      throw new RenderError(`Cannot open ${filePath}: ${formatError(error)}`, { filePath });
    }
  }

  async render(filePath: string, pageIndex: number, scale: number): Promise<Buffer> {
    try {
      return await this.withDocument(filePath, async (document) => {
        const page = await document.getPage(pageIndex + 1);
        const viewport = page.getViewport({ scale });
        const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
        const context = canvas.getContext('2d');
        context.fillStyle = '#ffffff';
        context.fillRect(0, 0, canvas.width, canvas.height);

        await page.render({ canvasContext: context, viewport }).promise;
        page.cleanup();
        return canvas.encode('jpeg', JPEG_QUALITY);
      });
    } catch (error) {
      throw new RenderError(
        `Failed to render page ${pageIndex + 1} of ${filePath}: ${formatError(error)}`,
        { filePath, pageIndex, scale }
      );
    }
  }
}
