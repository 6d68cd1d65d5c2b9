/**
 * Tests for text-pattern author extraction
 *
 * @module tests/unit/authors/text-patterns
 */

import { describe, it, expect } from 'vitest';
import { extractAuthorsFromText } from '../../../src/services/authors/text-patterns.js';
import type { DocumentClassification } from '../../../src/models/document.js';

const CONTACT_LINES = [
  'Jane Doe / Research Analyst / +1 212 538 0100 / jane.doe@credit-suisse.com',
  'Mark Lee / Associate / 44 20 7888 1000 / mark.lee@credit-suisse.com',
].join('\n');

const CREDIT_SUISSE: DocumentClassification = {
  docType: 'standard',
  institution: 'credit suisse',
  institutionDomain: 'credit-suisse.com',
};

describe('extractAuthorsFromText', () => {
  it('reads slash-separated contact lines for Credit Suisse documents', () => {
    expect(extractAuthorsFromText(CONTACT_LINES, CREDIT_SUISSE)).toEqual([
      { name: 'Jane Doe', title: 'Research Analyst', email: 'jane.doe@credit-suisse.com' },
      { name: 'Mark Lee', title: 'Associate', email: 'mark.lee@credit-suisse.com' },
    ]);
  });

  it('ignores contact lines for other institutions', () => {
    expect(
      extractAuthorsFromText(CONTACT_LINES, {
        docType: 'standard',
        institution: 'barclays',
        institutionDomain: 'barclays.com',
      })
    ).toEqual([]);
  });

  it('reads former analysts from termination notices', () => {
    const text = 'We are terminating coverage. The former analyst was Jane Doe. Previous coverage by Mark Lee, CFA.';
    expect(extractAuthorsFromText(text, { docType: 'termination' })).toEqual([
      { name: 'Jane Doe', title: 'Former Analyst', email: '' },
      { name: 'Mark Lee', title: 'Former Analyst', email: '' },
    ]);
  });

  it('returns nothing for standard documents without a known layout', () => {
    expect(extractAuthorsFromText('The former analyst was Jane Doe.', { docType: 'standard' })).toEqual([]);
    expect(extractAuthorsFromText('', CREDIT_SUISSE)).toEqual([]);
  });
});
