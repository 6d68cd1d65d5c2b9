/**
 * Document Classifier
 *
 * Derives document type and publishing institution from the supporting text
 * (first few pages) of a report. Both drive prompt construction, the
 * text-pattern fallback and email domain correction.
 *
 * @module services/classification/classifier
 */

import type { DocType, DocumentClassification } from '../../models/document.js';
import type { FeatureToggles } from '../../config/schema.js';
import { ClassificationError, formatError } from '../../utils/errors.js';
import { escapeMarkup } from './markup.js';

// ═══════════════════════════════════════════════════════════════════════════════
// PATTERN FAMILIES (checked in order; first family with a match wins)
// ═══════════════════════════════════════════════════════════════════════════════

interface DocTypeRule {
  docType: Exclude<DocType, 'standard'>;
  patterns: RegExp[];
}

export const DOC_TYPE_RULES: readonly DocTypeRule[] = [
  {
    docType: 'compilation',
    patterns: [
      /Page\s+Headline\s+Analyst/i,
      /Table of Contents.*Analyst/i,
      /SECTION.*AUTHOR/i,
      /Contents.*Author/i,
      /Analyst:\s*[A-Z][a-z]+/i,
      /\|\s*Analyst\s*\|/i,
    ],
  },
  {
    docType: 'termination',
    patterns: [
      /Termination of Coverage/i,
      /owing to the (?:primary )?analyst's departure/i,
      /we are terminating coverage/i,
      /terminating coverage for the following names/i,
      /terminating our coverage of/i,
      /terminating research coverage/i,
    ],
  },
];

/**
 * Known institutions in match order. Lower-case name -> canonical email domain.
 */
export const INSTITUTIONS: ReadonlyArray<readonly [name: string, domain: string]> = [
  ['stephens', 'stephens.com'],
  ['wells fargo', 'wellsfargo.com'],
  ['morgan stanley', 'morganstanley.com'],
  ['goldman sachs', 'gs.com'],
  ['jp morgan', 'jpmorgan.com'],
  ['credit suisse', 'credit-suisse.com'],
  ['ubs', 'ubs.com'],
  ['barclays', 'barclays.com'],
  ['citigroup', 'citi.com'],
  ['deutsche bank', 'db.com'],
  ['bank of america', 'bofa.com'],
  ['jefferies', 'jefferies.com'],
  ['cowen', 'cowen.com'],
];

// ═══════════════════════════════════════════════════════════════════════════════
// DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Classify the document type. Compilation signals take precedence over
 * termination signals.
 *
 * @throws ClassificationError if the pattern engine fails
 */
export function detectDocumentType(text: string): DocType {
  if (!text) return 'standard';
  const escaped = escapeMarkup(text);

  try {
    for (const rule of DOC_TYPE_RULES) {
      if (rule.patterns.some((pattern) => pattern.test(escaped))) {
        return rule.docType;
      }
    }
    return 'standard';
  } catch (error) {
    throw new ClassificationError(`Document type detection failed: ${formatError(error)}`);
  }
}

/**
 * Case-insensitive substring search against the institution table.
 */
export function identifyInstitution(
  text: string
): { institution: string; institutionDomain: string } | undefined {
  if (!text) return undefined;
  const haystack = text.toLowerCase();
  for (const [name, domain] of INSTITUTIONS) {
    if (haystack.includes(name)) {
      return { institution: name, institutionDomain: domain };
    }
  }
  return undefined;
}

/**
 * Build the classification for one document. Disabled features and
 * classification failures leave the corresponding fields at their defaults.
 */
export function classifyDocument(
  text: string,
  features: Pick<FeatureToggles, 'documentTypeDetection' | 'institutionDetection'>
): DocumentClassification {
  let docType: DocType = 'standard';
  if (features.documentTypeDetection) {
    try {
      docType = detectDocumentType(text);
    } catch (error) {
      console.error(`[Classifier] ${formatError(error)}. Falling back to standard`);
    }
  }

  const classification: DocumentClassification = { docType };
  if (features.institutionDetection) {
    const match = identifyInstitution(text);
    if (match) {
      classification.institution = match.institution;
      classification.institutionDomain = match.institutionDomain;
    }
  }
  return classification;
}
