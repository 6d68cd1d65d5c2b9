/**
 * Text-pattern author extraction
 *
 * Second stage of the fallback chain: when the vision model finds no
 * person, some documents still name their authors in a fixed textual
 * layout that a regular expression can read.
 *
 * @module services/authors/text-patterns
 */

import type { AuthorRecord } from '../../models/author.js';
import type { DocumentClassification } from '../../models/document.js';
import { cleanAuthorName } from './name-cleaner.js';
import { isInstitutionalAuthor } from './record-cleaner.js';

/** "Jane Doe / Research Analyst / +1 212 555 0100 / jane.doe@bank.com" */
const SLASH_CONTACT_LINE =
  /([A-Z][a-z]+\s+[A-Z][a-zA-Z\-']+)\s*\/\s*([^/]+)\s*\/\s*([\d\s+\-.]+)\s*\/\s*([a-zA-Z0-9.\-_]+@[a-zA-Z0-9\-_.]+\.[a-zA-Z]{2,})/g;

/** "former analyst was Jane Doe", "previous coverage by Jane Doe" */
const FORMER_ANALYST =
  /(?:former|previous)\s+(?:analyst|author|coverage)\s+(?:(?:was|by)\s+)?([A-Z][a-z]+\s+[A-Z][a-zA-Z\-']+)/gi;

export const FORMER_ANALYST_TITLE = 'Former Analyst';

function fromContactLines(text: string): AuthorRecord[] {
  const authors: AuthorRecord[] = [];
  for (const match of text.matchAll(SLASH_CONTACT_LINE)) {
    const [, name, title, , email] = match;
    const record: AuthorRecord = { name, title: title.trim(), email: email.trim() };
    if (name && !isInstitutionalAuthor(record)) {
      authors.push({ ...record, name: cleanAuthorName(name) });
    }
  }
  return authors;
}

function fromTerminationNotice(text: string): AuthorRecord[] {
  const authors: AuthorRecord[] = [];
  for (const match of text.matchAll(FORMER_ANALYST)) {
    const name = match[1];
    const record: AuthorRecord = { name, title: FORMER_ANALYST_TITLE, email: '' };
    if (name && !isInstitutionalAuthor(record)) {
      authors.push({ ...record, name: cleanAuthorName(name) });
    }
  }
  return authors;
}

/**
 * Read authors from supporting text using the layouts known for the
 * document's institution and type. Returns [] when no layout applies.
 */
export function extractAuthorsFromText(
  text: string,
  classification: DocumentClassification
): AuthorRecord[] {
  if (!text) return [];

  const authors: AuthorRecord[] = [];
  if (classification.institution?.toLowerCase().includes('credit suisse')) {
    authors.push(...fromContactLines(text));
  }
  if (classification.docType === 'termination') {
    authors.push(...fromTerminationNotice(text));
  }
  return authors;
}
