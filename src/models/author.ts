/**
 * Author interfaces for the report author extractor
 *
 * An AuthorRecord is created per page from inference output, normalized in
 * place, and never shared across documents.
 */

/**
 * One author as returned by the vision model and after normalization
 */
export interface AuthorRecord {
  /** Person name, possibly followed by credentials (", CFA") */
  name: string;
  /** Job title; empty string when unknown */
  title: string;
  /** Single email address; empty string when unknown */
  email: string;
}

/**
 * 0-based page index -> authors found on that page, in model order.
 * Built once per document run and read-only afterwards.
 */
export type PageAuthorMap = ReadonlyMap<number, readonly AuthorRecord[]>;

/**
 * One persisted result row (conceptually one per processed document)
 */
export interface ResultRow {
  /** Document key: file base name without extension */
  documentKey: string;
  /** Canonical author list in output order */
  authors: AuthorRecord[];
}

/**
 * Where the final author list came from
 */
export type AuthorSource = 'image' | 'text_pattern' | 'none';
