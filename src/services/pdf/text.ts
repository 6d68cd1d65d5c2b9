/**
 * Supporting text extraction
 *
 * Text of the first few pages feeds classification, the text-pattern
 * fallback and the prompt. Extraction failure yields '' and the document
 * is processed on images alone.
 *
 * @module services/pdf/text
 */

import * as fs from 'fs';
import pdfParse from 'pdf-parse-fork';
import { formatError } from '../../utils/errors.js';

export interface TextExtractor {
  extract(filePath: string, maxPages: number): Promise<string>;
}

export class PdfTextExtractor implements TextExtractor {
  async extract(filePath: string, maxPages: number): Promise<string> {
    if (maxPages <= 0) return '';
    try {
      const buffer = await fs.promises.readFile(filePath);
      const data = await pdfParse(buffer, { max: maxPages });
      return data.text;
    } catch (error) {
      console.error(`[PdfText] Text extraction failed for ${filePath}: ${formatError(error)}`);
      return '';
    }
  }
}
