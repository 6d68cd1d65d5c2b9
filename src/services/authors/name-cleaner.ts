/**
 * Author name cleaning
 *
 * @module services/authors/name-cleaner
 */

import {
  LONG_NAME_DELIMITERS,
  MAX_NAME_LENGTH,
  MAX_NAME_TOKENS,
  METADATA_KEYWORD_RULES,
  NAME_SUFFIX_PATTERN,
  applyFirstMatchingRule,
  applyRewriteRules,
} from './rules.js';
import { normalizeCredentials } from './credentials.js';

const EDGE_PUNCTUATION = /^[.,\s]+|[.,\s]+$/g;

function stripEdgePunctuation(text: string): string {
  return text.replace(EDGE_PUNCTUATION, '');
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Turn a raw model-supplied name into "First [Middle] Last[, CRED...]".
 *
 * Steps: collapse whitespace; cut over-long names at the first credential
 * delimiter; drop organisation/section keywords and what follows them;
 * canonical credential casing; cap at MAX_NAME_TOKENS tokens if still too
 * long; drop digits unless the name carries a generational suffix.
 */
export function cleanAuthorName(raw: string | null | undefined): string {
  if (!raw) return '';

  // Newlines survive this pass so they can act as a cut point below.
  let name = raw
    .replace(/\r\n?/g, '\n')
    .replace(/[^\S\n]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .trim();

  if (name.length > MAX_NAME_LENGTH) {
    name = applyFirstMatchingRule(name, LONG_NAME_DELIMITERS).text;
  }
  name = collapseWhitespace(name);

  name = applyRewriteRules(name, METADATA_KEYWORD_RULES);
  name = normalizeCredentials(stripEdgePunctuation(name));

  if (name.length > MAX_NAME_LENGTH) {
    name = name.split(' ').slice(0, MAX_NAME_TOKENS).join(' ');
    name = normalizeCredentials(stripEdgePunctuation(name));
  }

  if (!NAME_SUFFIX_PATTERN.test(name)) {
    name = name.replace(/\d+/g, '');
  }

  return stripEdgePunctuation(collapseWhitespace(name));
}
