/**
 * Built-in prompt templates, used for any template the config file omits.
 *
 * Slots in braces are filled by `renderTemplate()`:
 *   {page_num_display} {total_pages_in_doc} {institution_specific}
 *   {first_page_emphasis} {supporting_text} {termination_specific}
 *
 * @module config/default-prompts
 */

export interface PromptTemplates {
  readonly standardReport: string;
  readonly compilationReport: string;
  readonly creditSuisseSpecific: string;
  readonly firstPageEmphasis: string;
  readonly terminationSpecific: string;
}

const JSON_CONTRACT = `Return ONLY a JSON object of the form:
{"authors": [{"name": "First Last, CFA", "title": "Senior Analyst", "email": "first.last@bank.com"}]}
Use empty strings for unknown fields. Return {"authors": []} when no individual author is visible.`;

export const DEFAULT_PROMPTS: PromptTemplates = {
  standardReport: `Analyze this document image (page {page_num_display} of {total_pages_in_doc}) and identify only the true authors of the research report.
{institution_specific}{first_page_emphasis}{termination_specific}
Authors are individual analysts, usually listed near the top of the first page or in a contact box, with a title and an email address.
Do NOT report department names, research teams, companies mentioned in the report, or people quoted in the text.
Text extracted from the document for context: {supporting_text}

${JSON_CONTRACT}`,

  compilationReport: `Analyze this document image (page {page_num_display} of {total_pages_in_doc}). The document is a compilation of several research notes, each with its own authors.
{institution_specific}{first_page_emphasis}{termination_specific}
Identify only the TRUE AUTHORS of the sections visible on this page, for example names in an "Analyst" column of a table of contents or the byline of a section.
Do NOT report department names, research teams or companies under coverage.
Text extracted from the document for context: {supporting_text}

${JSON_CONTRACT}`,

  creditSuisseSpecific: `This is a Credit Suisse research report. Credit Suisse lists authors as "Name / Title / Phone / Email" lines; read each line as one author. `,

  firstPageEmphasis: `THIS IS THE FIRST PAGE where authors typically appear at the very top. Focus on the top section. `,

  terminationSpecific: `This appears to be a termination of coverage report, which may not name individual analysts. Report a person only if the page explicitly names them as the analyst. `,
};
