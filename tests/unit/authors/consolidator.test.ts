/**
 * Tests for author consolidation
 *
 * @module tests/unit/authors/consolidator
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  consolidateAuthors,
  correctEmailDomain,
  excludeInstitutional,
  prioritizeFirstPage,
  selectCandidates,
  standardizeCredentials,
  validateEmails,
} from '../../../src/services/authors/consolidator.js';
import { baseName } from '../../../src/services/authors/credentials.js';
import type { AuthorRecord } from '../../../src/models/author.js';
import type { DocumentClassification } from '../../../src/models/document.js';

function author(name: string, title = '', email = ''): AuthorRecord {
  return { name, title, email };
}

const ALL_FEATURES = { prioritizeFirstPage: true, emailValidation: true };

const WELLS_FARGO: DocumentClassification = {
  docType: 'standard',
  institution: 'wells fargo',
  institutionDomain: 'wellsfargo.com',
};

describe('standardizeCredentials', () => {
  it('merges a bare name into its credentialed duplicate', () => {
    const result = standardizeCredentials([
      author('Jane Doe', 'Analyst', 'jane@x.com'),
      author('Jane Doe, CFA'),
    ]);
    expect(result).toEqual([author('Jane Doe, CFA', 'Analyst', 'jane@x.com')]);
  });

  it('unions credentials across a group', () => {
    const result = standardizeCredentials([
      author('Ann Lee, PhD', 'Economist'),
      author('Ann Lee, CFA', '', 'ann.lee@bank.com'),
    ]);
    expect(result).toEqual([author('Ann Lee, CFA, PhD', 'Economist', 'ann.lee@bank.com')]);
  });

  it('breaks credential ties with the longer name', () => {
    const result = standardizeCredentials([
      author('Tom Hale, CFA', 'Analyst'),
      author('Tom Hale, C.F.A.', 'Senior Analyst'),
    ]);
    expect(result).toEqual([author('Tom Hale, CFA', 'Senior Analyst')]);
  });

  it('orders output by first occurrence of each person', () => {
    const result = standardizeCredentials([
      author('Amy Bell'),
      author('Carl Dunn'),
      author('Amy Bell, CFA'),
    ]);
    expect(result.map((a) => a.name)).toEqual(['Amy Bell, CFA', 'Carl Dunn']);
  });

  it('never returns two records with the same base name', () => {
    const input = [
      author('Amy Bell'),
      author('AMY BELL, MD'),
      author('Carl Dunn, PhD'),
      author('carl dunn'),
      author('Amy Bell, CFA', 'Strategist'),
      author('Dana Fox'),
      author('Carl Dunn, CFA, PhD'),
    ];
    const keys = standardizeCredentials(input).map((a) => baseName(a.name));
    expect(new Set(keys).size).toBe(keys.length);
    expect(keys).toEqual(['amy bell', 'carl dunn', 'dana fox']);
  });

  it('does not mutate its input', () => {
    const input = [author('Jane Doe', 'Analyst'), author('Jane Doe, CFA')];
    standardizeCredentials(input);
    expect(input).toEqual([author('Jane Doe', 'Analyst'), author('Jane Doe, CFA')]);
  });
});

describe('correctEmailDomain', () => {
  it('appends the institution domain to a bare local part', () => {
    expect(correctEmailDomain('jdoe', 'wellsfargo.com')).toBe('jdoe@wellsfargo.com');
  });

  it('moves an address onto the institution domain', () => {
    expect(correctEmailDomain('jane.doe@wf.com', 'wellsfargo.com')).toBe('jane.doe@wellsfargo.com');
  });

  it('keeps plus and percent local parts verbatim', () => {
    expect(correctEmailDomain('j+doe@other.com', 'wellsfargo.com')).toBe('j+doe@wellsfargo.com');
    expect(correctEmailDomain('desk%ny@other.com', 'wellsfargo.com')).toBe('desk%ny@wellsfargo.com');
  });

  it('keeps addresses already on the domain', () => {
    expect(correctEmailDomain('jane.doe@WellsFargo.com', 'wellsfargo.com')).toBe('jane.doe@WellsFargo.com');
  });

  it('leaves unusable fields and unknown domains alone', () => {
    expect(correctEmailDomain('Jane Doe', 'wellsfargo.com')).toBe('Jane Doe');
    expect(correctEmailDomain('jdoe', undefined)).toBe('jdoe');
    expect(correctEmailDomain('', 'wellsfargo.com')).toBe('');
  });
});

describe('validateEmails', () => {
  it('corrects only non-empty emails', () => {
    expect(
      validateEmails([author('Jane Doe', '', 'jdoe'), author('Mark Lee')], 'wellsfargo.com')
    ).toEqual([author('Jane Doe', '', 'jdoe@wellsfargo.com'), author('Mark Lee')]);
  });
});

describe('prioritizeFirstPage', () => {
  it('moves first-page authors ahead, keeping relative order', () => {
    const pages = new Map<number, AuthorRecord[]>([
      [0, [author('Carl Dunn, CFA'), author('Eve Gray')]],
      [3, [author('Amy Bell')]],
    ]);
    const result = prioritizeFirstPage(
      [author('Amy Bell'), author('Eve Gray'), author('Dana Fox'), author('Carl Dunn')],
      pages
    );
    expect(result.map((a) => a.name)).toEqual(['Eve Gray', 'Carl Dunn', 'Amy Bell', 'Dana Fox']);
  });

  it('keeps order when page 0 has no authors', () => {
    const authors = [author('Amy Bell'), author('Carl Dunn')];
    expect(prioritizeFirstPage(authors, new Map<number, AuthorRecord[]>([[1, authors]]))).toEqual(authors);
  });
});

describe('excludeInstitutional / selectCandidates', () => {
  it('removes institutional records', () => {
    expect(
      excludeInstitutional([author('Equity Research Team'), author('Jane Doe'), author('')])
    ).toEqual([author('Jane Doe')]);
  });

  it('prefers image results and never mixes sources', () => {
    expect(selectCandidates([author('Jane Doe')], [author('Mark Lee')])).toEqual({
      authors: [author('Jane Doe')],
      source: 'image',
    });
    expect(selectCandidates([], [author('Mark Lee')]).source).toBe('text_pattern');
    expect(selectCandidates([], [])).toEqual({ authors: [], source: 'none' });
  });
});

describe('consolidateAuthors', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const pages = new Map<number, AuthorRecord[]>([
    [0, [author('Jane Doe', 'Analyst', 'jane.doe@wf.com')]],
    [
      1,
      [
        author('Equity Research Team', '', 'equity.research@wf.com'),
        author('Mark Lee, CFA'),
        author('Jane Doe, CFA'),
      ],
    ],
  ]);

  it('runs every stage in order', () => {
    const result = consolidateAuthors(pages, [], WELLS_FARGO, { features: ALL_FEATURES });
    expect(result).toEqual({
      source: 'image',
      authors: [
        author('Jane Doe, CFA', 'Analyst', 'jane.doe@wellsfargo.com'),
        author('Mark Lee, CFA'),
      ],
    });
  });

  it('is idempotent on its own output', () => {
    const first = consolidateAuthors(pages, [], WELLS_FARGO, { features: ALL_FEATURES });
    const second = consolidateAuthors(new Map<number, AuthorRecord[]>([[0, first.authors]]), [], WELLS_FARGO, {
      features: ALL_FEATURES,
    });
    expect(second.authors).toEqual(first.authors);
  });

  it('falls back to text-pattern authors when pages yield no person', () => {
    const imageOnlyTeams = new Map<number, AuthorRecord[]>([
      [0, []],
      [1, [author('Research Team')]],
    ]);
    const result = consolidateAuthors(
      imageOnlyTeams,
      [author('Jane Doe', 'Former Analyst')],
      { docType: 'termination' },
      { features: ALL_FEATURES }
    );
    expect(result).toEqual({ source: 'text_pattern', authors: [author('Jane Doe', 'Former Analyst')] });
  });

  it('reports no authors when both sources are empty', () => {
    expect(consolidateAuthors(new Map(), [], { docType: 'standard' }, { features: ALL_FEATURES })).toEqual({
      source: 'none',
      authors: [],
    });
  });

  it('skips disabled stages', () => {
    const result = consolidateAuthors(
      new Map<number, AuthorRecord[]>([
        [0, [author('Amy Bell', '', 'amy.bell@wf.com')]],
        [1, [author('Carl Dunn')]],
      ]),
      [],
      WELLS_FARGO,
      { features: { prioritizeFirstPage: false, emailValidation: false } }
    );
    expect(result.authors).toEqual([author('Amy Bell', '', 'amy.bell@wf.com'), author('Carl Dunn')]);
  });
});
