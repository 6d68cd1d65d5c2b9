/**
 * Author Cleaning Rules
 *
 * The heuristic vocabulary lives here as ordered tables. Control flow in
 * the cleaners only walks these tables through the two interpreters at the
 * bottom of the file, so extending a vocabulary never touches the cleaners.
 *
 * @module services/authors/rules
 */

import type { AuthorRecord } from '../../models/author.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RULE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A text rewrite.
 *  - remove:     delete every match
 *  - replace:    replace every match
 *  - cut_from:   drop the first match and everything after it
 *  - keep_through: keep text up to the end of the first match
 */
export type RewriteRule =
  | { kind: 'remove'; pattern: RegExp }
  | { kind: 'replace'; pattern: RegExp; replacement: string }
  | { kind: 'cut_from'; pattern: RegExp }
  | { kind: 'keep_through'; pattern: RegExp };

export type RecordField = keyof AuthorRecord;

/**
 * A predicate on one field of a record. `reason` ends up in debug logs.
 */
export interface MatchRule {
  field: RecordField;
  pattern: RegExp;
  reason: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

export const MAX_NAME_LENGTH = 70;

/** Token count a name is cut to when nothing else brings it under MAX_NAME_LENGTH */
export const MAX_NAME_TOKENS = 5;

export type Credential = 'CFA' | 'PhD' | 'MD';

/**
 * Recognised credentials with the spellings that map onto them.
 * Order is the canonical output order.
 */
export const CREDENTIALS: ReadonlyArray<{ canonical: Credential; pattern: RegExp }> = [
  { canonical: 'CFA', pattern: /\bC\.?F\.?A\b\.?/i },
  { canonical: 'MD', pattern: /\bM\.?D\b\.?/i },
  { canonical: 'PhD', pattern: /\bPh\.?\s?D\b\.?/i },
];

export const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;

/** Generational suffixes; their presence keeps digits in a name */
export const NAME_SUFFIX_PATTERN = /\b(?:Jr\.?|Sr\.?|I{2,3}|IV|V)\b/i;

// ═══════════════════════════════════════════════════════════════════════════════
// NAME CLEANING TABLES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Cut points for over-long names, tried in order; the first that matches wins.
 */
export const LONG_NAME_DELIMITERS: readonly RewriteRule[] = [
  { kind: 'keep_through', pattern: /,\s*Ph\.?\s?D\b\.?/i },
  { kind: 'keep_through', pattern: /,\s*CFA\b/i },
  { kind: 'keep_through', pattern: /,\s*M\.?D\b\.?/i },
  { kind: 'cut_from', pattern: /\n/ },
  { kind: 'cut_from', pattern: /\s*\(/ },
];

/**
 * Organisation and section words that end a name: the keyword and all text
 * after it are dropped. A leading keyword is removed on its own first.
 */
export const METADATA_KEYWORDS: readonly string[] = [
  'SECURITIES',
  'LLC',
  'EQUITY',
  'RESEARCH',
  'DEPARTMENT',
  'Newsletter',
  'WELLS FARGO',
  'Corporation',
  'CORP',
  'INC',
  'LTD',
  'COMPANY',
  'SECTION',
  'CONTENTS',
  'DISCLAIMER',
  'DISCLOSURES',
  'PUBLICATION',
  'PAGE',
  'REPORT',
  'TMT',
  'Edition',
  'Conference',
  'Market',
  'GLOBAL',
  'STRATEGY',
  'INVESTMENT',
  'BANKING',
  'GROUP',
  'ASSOCIATES',
  'ANALYSIS',
  'CONTACT',
  'INFORMATION',
  'APPENDIX',
  'INDEX',
];

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Keyword table compiled to rewrite rules: strip leading keyword, then cut from it. */
export const METADATA_KEYWORD_RULES: readonly RewriteRule[] = METADATA_KEYWORDS.flatMap(
  (keyword): RewriteRule[] => [
    { kind: 'remove', pattern: new RegExp(`^${escapeRegExp(keyword)}\\s+`, 'i') },
    { kind: 'cut_from', pattern: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i') },
  ]
);

/** Credential spellings rewritten to canonical casing. */
export const CREDENTIAL_CASING_RULES: readonly RewriteRule[] = [
  { kind: 'replace', pattern: /\s*,\s*/, replacement: ', ' },
  { kind: 'replace', pattern: /\bC\.F\.A\b\.?/i, replacement: 'CFA' },
  { kind: 'replace', pattern: /\bcfa\b/i, replacement: 'CFA' },
  { kind: 'replace', pattern: /\bPh\.?\s?D\b\.?/i, replacement: 'PhD' },
  { kind: 'replace', pattern: /\bM\.D\.?(?=\s|,|$)/i, replacement: 'MD' },
  { kind: 'replace', pattern: /\bmd\b/i, replacement: 'MD' },
];

// ═══════════════════════════════════════════════════════════════════════════════
// ACCEPTANCE TABLES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Words that mark a short name (<= 3 tokens, no "Name, CRED" comma) as an
 * organisation rather than a person.
 */
export const NON_AUTHOR_NAME_WORDS: ReadonlySet<string> = new Set(
  [
    'Securities',
    'Equity',
    'Research',
    'Capital',
    'Markets',
    'Group',
    'LLC',
    'Inc.',
    'Limited',
    'Advisors',
    'Asset',
    'Management',
    'Financial',
    'Bank',
    'Investment',
    'Corporation',
    'Department',
    'Contents',
    'Disclaimer',
    'Publication',
    'Report',
  ].map((w) => w.toLowerCase())
);

/** Whole-name values that are roles or credentials, never people. */
export const ROLE_TOKENS: ReadonlySet<string> = new Set([
  'CFA',
  'PHD',
  'MD',
  'ANALYST',
  'AUTHOR',
  'CONTACT',
  'TEAM',
]);

// ═══════════════════════════════════════════════════════════════════════════════
// TITLE CLEANING TABLE
// ═══════════════════════════════════════════════════════════════════════════════

export const TITLE_SCRUB_RULES: readonly RewriteRule[] = [
  { kind: 'remove', pattern: /\s*\([^)]*\)/ },
  { kind: 'remove', pattern: /(?:\+\d{1,2}\s?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}/ },
  { kind: 'remove', pattern: EMAIL_PATTERN },
];

// ═══════════════════════════════════════════════════════════════════════════════
// INSTITUTIONAL AUTHOR TABLE
// ═══════════════════════════════════════════════════════════════════════════════

const INSTITUTIONAL_NAME_PATTERNS: readonly RegExp[] = [
  /Research\s+(?:Analysts|Department)/i,
  /[A-Z]{2,}\s+(?:US\s+)?Eq\.\s+Res/i,
  /Equity\s+Research/i,
  /Securities\s+Research/i,
  /Investment\s+Research/i,
  /Global\s+Research/i,
  /Research\s+Team/i,
  /Research\s+Desk/i,
];

const INSTITUTIONAL_NAME_KEYWORDS: readonly string[] = [
  'US Eq. Res',
  'Eq. Res',
  'Research Team',
  'Research Dept',
  'Equity Research',
  'Global Research',
  'Research Division',
  'Research Analysts',
  'Credit Suisse Research',
];

const GENERIC_EMAIL_PATTERNS: readonly RegExp[] = [
  /equity\.research@/i,
  /research@/i,
  /info@/i,
  /contact@/i,
  /^[a-z]+@/i,
];

const INSTITUTIONAL_TITLE_PATTERNS: readonly RegExp[] = [/^Department$/i, /^Team$/i, /^Group$/i];

export const INSTITUTIONAL_RULES: readonly MatchRule[] = [
  ...INSTITUTIONAL_NAME_PATTERNS.map(
    (pattern): MatchRule => ({ field: 'name', pattern, reason: 'department name pattern' })
  ),
  ...INSTITUTIONAL_NAME_KEYWORDS.map(
    (keyword): MatchRule => ({
      field: 'name',
      pattern: new RegExp(escapeRegExp(keyword), 'i'),
      reason: `institutional keyword "${keyword}"`,
    })
  ),
  ...GENERIC_EMAIL_PATTERNS.map(
    (pattern): MatchRule => ({ field: 'email', pattern, reason: 'generic department email' })
  ),
  ...INSTITUTIONAL_TITLE_PATTERNS.map(
    (pattern): MatchRule => ({ field: 'title', pattern, reason: 'institutional title' })
  ),
];

// ═══════════════════════════════════════════════════════════════════════════════
// INTERPRETERS
// ═══════════════════════════════════════════════════════════════════════════════

function withGlobal(pattern: RegExp): RegExp {
  return pattern.global ? pattern : new RegExp(pattern.source, pattern.flags + 'g');
}

function applyRule(text: string, rule: RewriteRule): string {
  switch (rule.kind) {
    case 'remove':
      return text.replace(withGlobal(rule.pattern), '');
    case 'replace':
      return text.replace(withGlobal(rule.pattern), rule.replacement);
    case 'cut_from': {
      const match = rule.pattern.exec(text);
      return match ? text.slice(0, match.index) : text;
    }
    case 'keep_through': {
      const match = rule.pattern.exec(text);
      return match ? text.slice(0, match.index + match[0].length) : text;
    }
  }
}

/**
 * Apply every rule in order.
 */
export function applyRewriteRules(text: string, rules: readonly RewriteRule[]): string {
  return rules.reduce((current, rule) => applyRule(current, rule), text);
}

/**
 * Apply only the first rule whose pattern matches.
 */
export function applyFirstMatchingRule(
  text: string,
  rules: readonly RewriteRule[]
): { text: string; rule?: RewriteRule } {
  for (const rule of rules) {
    if (rule.pattern.test(text)) {
      return { text: applyRule(text, rule), rule };
    }
  }
  return { text };
}

/**
 * First rule that matches its field of the record, if any. Empty fields never match.
 */
export function findMatchingRule(
  record: AuthorRecord,
  rules: readonly MatchRule[]
): MatchRule | undefined {
  return rules.find((rule) => {
    const value = record[rule.field];
    return value.length > 0 && rule.pattern.test(value);
  });
}
