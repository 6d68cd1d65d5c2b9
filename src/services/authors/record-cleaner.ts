/**
 * Per-record cleaning and filtering
 *
 * Applied to each page's raw author list: name cleaning, acceptance filter,
 * title cleaning with credential migration, email extraction. Plus the
 * institutional-author classifier used after all pages are collected.
 *
 * @module services/authors/record-cleaner
 */

import type { AuthorRecord } from '../../models/author.js';
import {
  CREDENTIALS,
  EMAIL_PATTERN,
  INSTITUTIONAL_RULES,
  NON_AUTHOR_NAME_WORDS,
  ROLE_TOKENS,
  TITLE_SCRUB_RULES,
  applyRewriteRules,
  findMatchingRule,
} from './rules.js';
import { normalizeCredentials } from './credentials.js';
import { cleanAuthorName } from './name-cleaner.js';

export interface CleanOptions {
  /** Log every rejected record */
  debug?: boolean;
}

function tokens(name: string): string[] {
  return name.split(/\s+/).filter(Boolean);
}

/**
 * Why a cleaned name is not a person, or undefined when it is acceptable.
 */
export function rejectionReason(name: string): string | undefined {
  const parts = tokens(name);
  if (!name || (parts.length < 2 && name.length < 3)) {
    return 'empty or too short';
  }

  if (parts.length <= 3 && !parts.some((p) => p.endsWith(','))) {
    const keyword = parts.find((p) => NON_AUTHOR_NAME_WORDS.has(p.toLowerCase()));
    if (keyword) {
      return `organisation keyword "${keyword}"`;
    }
  }

  if (ROLE_TOKENS.has(name.toUpperCase())) {
    return 'role or credential token';
  }
  return undefined;
}

/**
 * Scrub phone numbers, emails and asides out of a title, and move any
 * credential the name lacks from the title into the name.
 */
export function cleanTitle(rawTitle: string, name: string): { title: string; name: string } {
  let title = applyRewriteRules(rawTitle, TITLE_SCRUB_RULES).replace(/\s+/g, ' ').trim();
  let updatedName = name;

  for (const { canonical, pattern } of CREDENTIALS) {
    if (pattern.test(title) && !pattern.test(updatedName)) {
      updatedName = `${updatedName}, ${canonical}`;
      title = title.replace(new RegExp(`\\s*,?\\s*${pattern.source}`, 'gi'), '');
    }
  }

  title = title
    .replace(/\s+/g, ' ')
    .replace(/^[\s,]+|[\s,]+$/g, '');
  return { title, name: normalizeCredentials(updatedName) };
}

/**
 * First well-formed address in the field, or '' when there is none.
 */
export function extractEmail(raw: string): string {
  const match = EMAIL_PATTERN.exec(raw);
  return match ? match[0] : '';
}

/**
 * Clean one record. Returns null when the record is not an acceptable author.
 */
export function cleanAuthorRecord(
  record: AuthorRecord,
  options: CleanOptions = {}
): AuthorRecord | null {
  const name = cleanAuthorName(record.name);
  const reason = rejectionReason(name);
  if (reason) {
    if (options.debug) {
      console.error(`[AuthorCleaner] Skipping "${record.name}" -> "${name}": ${reason}`);
    }
    return null;
  }

  const cleaned = cleanTitle(record.title, name);
  return {
    name: cleaned.name,
    title: cleaned.title,
    email: extractEmail(record.email),
  };
}

/**
 * Clean every record found on a page, dropping the ones that are not people.
 */
export function cleanAuthorList(
  records: readonly AuthorRecord[],
  options: CleanOptions = {}
): AuthorRecord[] {
  const cleaned: AuthorRecord[] = [];
  for (const record of records) {
    const result = cleanAuthorRecord(record, options);
    if (result) cleaned.push(result);
  }
  return cleaned;
}

/**
 * Why a record names a department, team or role rather than a person,
 * or undefined for a person.
 */
export function institutionalReason(record: AuthorRecord): string | undefined {
  if (!record.name) return undefined;
  const rule = findMatchingRule(record, INSTITUTIONAL_RULES);
  if (rule) return rule.reason;
  if (tokens(record.name).length < 2) return 'single-token name';
  return undefined;
}

export function isInstitutionalAuthor(record: AuthorRecord): boolean {
  return institutionalReason(record) !== undefined;
}
