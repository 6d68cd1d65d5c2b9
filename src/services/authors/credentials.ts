/**
 * Credential helpers shared by cleaning, prioritisation and deduplication.
 *
 * @module services/authors/credentials
 */

import {
  CREDENTIALS,
  CREDENTIAL_CASING_RULES,
  applyRewriteRules,
  type Credential,
} from './rules.js';

const CREDENTIAL_STRIP_PATTERNS: readonly RegExp[] = CREDENTIALS.flatMap(({ pattern }) => [
  new RegExp(`,\\s*${pattern.source}`, 'gi'),
  new RegExp(`\\s+${pattern.source}`, 'gi'),
]);

/**
 * Canonical casing and comma spacing for credentials ("phd" -> "PhD", "Ph.D." -> "PhD").
 */
export function normalizeCredentials(name: string): string {
  if (!name) return '';
  return applyRewriteRules(name, CREDENTIAL_CASING_RULES).trim();
}

/**
 * Credentials present in a string, in canonical order.
 */
export function credentialsIn(text: string): Credential[] {
  return CREDENTIALS.filter(({ pattern }) => pattern.test(text)).map(({ canonical }) => canonical);
}

/**
 * Name without credentials and without anything after the first remaining comma.
 * Original casing is kept.
 */
export function stripCredentials(name: string): string {
  let stripped = name;
  for (const pattern of CREDENTIAL_STRIP_PATTERNS) {
    stripped = stripped.replace(pattern, '');
  }
  return stripped.split(',')[0].replace(/\s+/g, ' ').trim();
}

/**
 * Dedup and first-page matching key: credential-free, lower-cased name.
 */
export function baseName(name: string): string {
  return stripCredentials(name).toLowerCase();
}

/**
 * "Jane Doe" + [PhD, CFA] -> "Jane Doe, CFA, PhD". Credentials are sorted by
 * their upper-case form and written in canonical casing.
 */
export function withCredentials(base: string, credentials: Iterable<Credential>): string {
  const sorted = [...new Set(credentials)].sort((a, b) =>
    a.toUpperCase().localeCompare(b.toUpperCase())
  );
  return sorted.length > 0 ? `${base}, ${sorted.join(', ')}` : base;
}
