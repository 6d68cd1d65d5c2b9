/**
 * Document classification interfaces
 *
 * A DocumentClassification is derived once from the supporting text of a
 * document and is immutable for the rest of the run.
 */

export const DOC_TYPES = ['standard', 'compilation', 'termination'] as const;

export type DocType = (typeof DOC_TYPES)[number];

export interface DocumentClassification {
  docType: DocType;
  /** Lower-case institution name as listed in the institution table */
  institution?: string;
  /** Canonical email domain of the institution */
  institutionDomain?: string;
}

/**
 * A PDF queued for processing
 */
export interface DocumentInput {
  /** Absolute or working-directory-relative path of the PDF */
  filePath: string;
  /** File base name without extension; the row key in the result table */
  documentKey: string;
}
