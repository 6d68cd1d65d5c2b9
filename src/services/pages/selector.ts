/**
 * Page Selector
 *
 * Decides which 0-based page indices of a document are rendered and sent
 * to the vision model. Output is always strictly increasing and within
 * [0, totalPages).
 *
 * @module services/pages/selector
 */

import type { PageSelectionConfig } from '../../config/schema.js';

function allPages(totalPages: number): number[] {
  return Array.from({ length: totalPages }, (_, i) => i);
}

/**
 * Select page indices for one document.
 *
 * - all: every page
 * - first_n: the first n pages; n <= 0 means all
 * - range: 1-based inclusive [start, end], clamped to the document. An empty
 *   clamped range falls back to the first page.
 *
 * With `alwaysIncludeFirst`, page 0 is added when missing.
 *
 * @param totalPages - Page count of the document
 * @param selection - Page selection settings
 * @returns Sorted, de-duplicated page indices (empty when totalPages is 0)
 */
export function selectPages(totalPages: number, selection: PageSelectionConfig): number[] {
  if (!Number.isInteger(totalPages) || totalPages <= 0) {
    return [];
  }

  let pages: number[];
  switch (selection.mode) {
    case 'all':
      pages = allPages(totalPages);
      break;

    case 'first_n':
      pages =
        selection.firstN <= 0
          ? allPages(totalPages)
          : allPages(Math.min(selection.firstN, totalPages));
      break;

    case 'range': {
      const [rangeStart, rangeEnd] = selection.range;
      const start = Math.max(0, rangeStart - 1);
      const end = Math.min(totalPages - 1, rangeEnd - 1);
      if (start <= end && start < totalPages) {
        pages = [];
        for (let i = start; i <= end; i++) pages.push(i);
      } else {
        console.error(
          `[PageSelector] Invalid page range [${rangeStart}, ${rangeEnd}] for ${totalPages} page(s). Defaulting to first page`
        );
        pages = [0];
      }
      break;
    }
  }

  if (selection.alwaysIncludeFirst && !pages.includes(0)) {
    pages.push(0);
  }

  return [...new Set(pages)].sort((a, b) => a - b);
}

/**
 * Human-readable summary of a selection, for progress logs.
 */
export function describeSelection(
  totalPages: number,
  selection: PageSelectionConfig,
  pages: readonly number[]
): string {
  switch (selection.mode) {
    case 'all':
      return `all ${totalPages} page(s)`;
    case 'first_n':
      return selection.firstN <= 0
        ? `all ${totalPages} page(s)`
        : `first ${selection.firstN} page(s); ${pages.length} selected`;
    case 'range':
      return `pages ${selection.range[0]}-${selection.range[1]}; ${pages.length} selected`;
  }
}
