/**
 * Tests for the pdf.js page renderer
 *
 * @module tests/unit/pdf/renderer
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PdfjsPageRenderer } from '../../../src/services/pdf/renderer.js';
import { RenderError } from '../../../src/utils/errors.js';

/** One 200x100 pt page holding a filled rectangle; xref offsets are computed. */
function singlePagePdf(): Buffer {
  const content = '0 0 1 rg 20 20 60 40 re f';
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 200 100] /Contents 4 0 R /Resources << >> >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
  ];

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(Buffer.byteLength(body, 'latin1'));
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = Buffer.byteLength(body, 'latin1');
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(body, 'latin1');
}

describe('PdfjsPageRenderer', () => {
  const renderer = new PdfjsPageRenderer();
  let dir: string;
  let pdfPath: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'report-authors-render-'));
    pdfPath = path.join(dir, 'one-page.pdf');
    fs.writeFileSync(pdfPath, singlePagePdf());
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('counts the pages of a document', async () => {
    expect(await renderer.pageCount(pdfPath)).toBe(1);
  });

  it('renders a page to JPEG bytes', async () => {
    const image = await renderer.render(pdfPath, 0, 1.5);
    expect(image[0]).toBe(0xff);
    expect(image[1]).toBe(0xd8);
  });

  it('raises RenderError for a page past the end', async () => {
    await expect(renderer.render(pdfPath, 3, 1)).rejects.toBeInstanceOf(RenderError);
  });

  it('raises RenderError when the file is missing', async () => {
    await expect(renderer.pageCount(path.join(dir, 'missing.pdf'))).rejects.toBeInstanceOf(
      RenderError
    );
  });

  it('raises RenderError when the file is not a PDF', async () => {
    const junk = path.join(dir, 'junk.pdf');
    fs.writeFileSync(junk, 'not a pdf at all');
    await expect(renderer.pageCount(junk)).rejects.toBeInstanceOf(RenderError);
  });
});
