/**
 * Prompt construction for one page.
 *
 * @module services/ollama/prompts
 */

import type { DocumentClassification } from '../../models/document.js';
import type { PromptTemplates } from '../../config/default-prompts.js';
import { escapeMarkup } from '../classification/markup.js';

/** Supporting text is a hint, not the document; the model only sees this much. */
export const SUPPORTING_TEXT_LIMIT = 300;

export interface PromptContext {
  /** 0-based page index */
  pageIndex: number;
  totalPages: number;
  supportingText: string;
  classification: DocumentClassification;
}

/**
 * Replace `{slot}` placeholders. Unknown slots are left as written.
 */
export function renderTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{([a-z_]+)\}/g, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? String(values[key]) : whole
  );
}

function institutionInstructions(
  institution: string | undefined,
  templates: PromptTemplates
): string {
  if (!institution) return '';
  if (institution.toLowerCase().includes('credit suisse')) {
    return templates.creditSuisseSpecific;
  }
  return `This is a research report from ${institution}. `;
}

export function buildPrompt(context: PromptContext, templates: PromptTemplates): string {
  const { classification } = context;
  const template =
    classification.docType === 'compilation' ? templates.compilationReport : templates.standardReport;

  return renderTemplate(template, {
    page_num_display: context.pageIndex + 1,
    total_pages_in_doc: context.totalPages,
    institution_specific: institutionInstructions(classification.institution, templates),
    first_page_emphasis: context.pageIndex === 0 ? templates.firstPageEmphasis : '',
    supporting_text: escapeMarkup(context.supportingText).slice(0, SUPPORTING_TEXT_LIMIT),
    termination_specific:
      classification.docType === 'termination' ? templates.terminationSpecific : '',
  });
}
