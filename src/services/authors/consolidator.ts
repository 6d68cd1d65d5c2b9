/**
 * Author Consolidator
 *
 * Turns the cleaned per-page author lists of one document into its
 * canonical author list:
 *
 *   institutional exclusion -> fallback -> first-page priority
 *     -> email domain correction -> credential standardisation/dedup
 *
 * Every step returns new records; inputs are never mutated.
 *
 * @module services/authors/consolidator
 */

import type { AuthorRecord, AuthorSource, PageAuthorMap } from '../../models/author.js';
import type { DocumentClassification } from '../../models/document.js';
import type { FeatureToggles } from '../../config/schema.js';
import { baseName, credentialsIn, stripCredentials, withCredentials } from './credentials.js';
import { institutionalReason } from './record-cleaner.js';
import type { Credential } from './rules.js';

export interface ConsolidationResult {
  authors: AuthorRecord[];
  /** Which extraction path produced the candidates */
  source: AuthorSource;
}

export interface ConsolidateOptions {
  features: Pick<FeatureToggles, 'prioritizeFirstPage' | 'emailValidation'>;
  debug?: boolean;
  /** Prefix for log lines, usually the document key */
  label?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STAGES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Remove records that name a department, team or role.
 */
export function excludeInstitutional(
  authors: readonly AuthorRecord[],
  log?: (message: string) => void
): AuthorRecord[] {
  return authors.filter((author) => {
    if (!author.name) return false;
    const reason = institutionalReason(author);
    if (reason) {
      log?.(`Filtering out institutional author "${author.name}" (${reason})`);
      return false;
    }
    return true;
  });
}

/**
 * ImageExtraction -> TextPatternExtraction -> NoAuthorsFound.
 * Image results and text results are never mixed.
 */
export function selectCandidates(
  imageAuthors: readonly AuthorRecord[],
  textAuthors: readonly AuthorRecord[]
): ConsolidationResult {
  if (imageAuthors.length > 0) {
    return { authors: [...imageAuthors], source: 'image' };
  }
  if (textAuthors.length > 0) {
    return { authors: [...textAuthors], source: 'text_pattern' };
  }
  return { authors: [], source: 'none' };
}

/**
 * Stable partition: authors whose base name appears on page 0 come first.
 */
export function prioritizeFirstPage(
  authors: readonly AuthorRecord[],
  pages: PageAuthorMap
): AuthorRecord[] {
  const firstPage = pages.get(0);
  if (!firstPage || firstPage.length === 0 || authors.length === 0) {
    return [...authors];
  }

  const firstPageNames = new Set(
    firstPage.filter((a) => a.name).map((a) => baseName(a.name))
  );
  const prioritized: AuthorRecord[] = [];
  const remaining: AuthorRecord[] = [];
  for (const author of authors) {
    (firstPageNames.has(baseName(author.name)) ? prioritized : remaining).push(author);
  }
  return [...prioritized, ...remaining];
}

const LOCAL_PART = /^([a-zA-Z0-9._%+-]+)(?:@.+)?$/;

/**
 * Rewrite an address onto the institution's domain.
 *
 * "jdoe" + "wellsfargo.com" -> "jdoe@wellsfargo.com". An address already on
 * the domain is returned unchanged, as is a field with no usable local part.
 */
export function correctEmailDomain(email: string, institutionDomain: string | undefined): string {
  if (!email || !institutionDomain) return email;

  const at = email.indexOf('@');
  if (at !== -1) {
    const domain = email.slice(at + 1).toLowerCase();
    if (domain === institutionDomain.toLowerCase()) return email;
  }

  const match = LOCAL_PART.exec(email);
  return match ? `${match[1]}@${institutionDomain}` : email;
}

export function validateEmails(
  authors: readonly AuthorRecord[],
  institutionDomain: string | undefined
): AuthorRecord[] {
  if (!institutionDomain) return [...authors];
  return authors.map((author) =>
    author.email
      ? { ...author, email: correctEmailDomain(author.email, institutionDomain) }
      : { ...author }
  );
}

function outranks(candidate: AuthorRecord, incumbent: AuthorRecord): boolean {
  const candidateCreds = credentialsIn(candidate.name).length;
  const incumbentCreds = credentialsIn(incumbent.name).length;
  // Equal credential counts go to the longer name, which can favour boilerplate.
  return (
    candidateCreds > incumbentCreds ||
    (candidateCreds === incumbentCreds && candidate.name.length > incumbent.name.length)
  );
}

function fillMissing(target: AuthorRecord, donor: AuthorRecord): AuthorRecord {
  return {
    name: target.name,
    title: target.title || donor.title,
    email: target.email || donor.email,
  };
}

/**
 * Group by base name and keep one record per person. The survivor gains
 * missing title/email from the others and, for groups of more than one,
 * every credential seen in the group.
 *
 * Output follows the order in which each group was first seen.
 */
export function standardizeCredentials(authors: readonly AuthorRecord[]): AuthorRecord[] {
  const groups = new Map<string, { winner: AuthorRecord; size: number; creds: Set<Credential> }>();

  for (const author of authors) {
    if (!author.name) continue;
    const key = baseName(author.name);
    if (!key) continue;

    const group = groups.get(key);
    if (!group) {
      groups.set(key, { winner: { ...author }, size: 1, creds: new Set(credentialsIn(author.name)) });
      continue;
    }

    group.winner = outranks(author, group.winner)
      ? fillMissing(author, group.winner)
      : fillMissing(group.winner, author);
    group.size += 1;
    for (const cred of credentialsIn(author.name)) group.creds.add(cred);
  }

  return [...groups.values()].map(({ winner, size, creds }) =>
    size > 1 ? { ...winner, name: withCredentials(stripCredentials(winner.name), creds) } : winner
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Consolidate one document's authors.
 *
 * @param pages - Cleaned authors per rendered page (0-based index)
 * @param textAuthors - Authors read from supporting text, used only when pages yield none
 */
export function consolidateAuthors(
  pages: PageAuthorMap,
  textAuthors: readonly AuthorRecord[],
  classification: DocumentClassification,
  options: ConsolidateOptions
): ConsolidationResult {
  const label = options.label ? `[Consolidator] ${options.label}:` : '[Consolidator]';
  const log = options.debug ? (message: string) => console.error(`${label} ${message}`) : undefined;

  const imageAuthors = [...pages.keys()]
    .sort((a, b) => a - b)
    .flatMap((index) => pages.get(index) ?? []);

  const candidates = selectCandidates(
    excludeInstitutional(imageAuthors, log),
    excludeInstitutional(textAuthors, log)
  );
  if (candidates.source === 'text_pattern') {
    console.error(`${label} No authors found on page images; using ${candidates.authors.length} from text patterns`);
  }

  let authors = candidates.authors;
  if (options.features.prioritizeFirstPage) {
    authors = prioritizeFirstPage(authors, pages);
  }
  if (options.features.emailValidation) {
    authors = validateEmails(authors, classification.institutionDomain);
  }
  authors = standardizeCredentials(authors);

  log?.(`${authors.length} unique author(s) from ${candidates.source}`);
  return { authors, source: candidates.source };
}
