/**
 * Page selectors ("1-3,5,8-10" or [1, 3, 5]) to sorted, unique 0-based indices.
 * Page numbers are 1-based; numbers outside the document are dropped.
 */

export type PageSelector = string | readonly number[] | null | undefined;

const RANGE_ITEM = /^(\d+)\s*(?:-\s*(\d+))?$/;

export function parsePageRange(selector: PageSelector, pageCount: number): number[] {
  if (selector === null || selector === undefined) {
    return Array.from({ length: pageCount }, (_, i) => i);
  }

  const pageNumbers = typeof selector === 'string' ? expandRangeString(selector, pageCount) : selector;

  const indices = new Set<number>();
  for (const pageNumber of pageNumbers) {
    if (Number.isInteger(pageNumber) && pageNumber >= 1 && pageNumber <= pageCount) {
      indices.add(pageNumber - 1);
    }
  }
  return [...indices].sort((a, b) => a - b);
}

function expandRangeString(selector: string, pageCount: number): number[] {
  const pages: number[] = [];

  for (const rawItem of selector.split(',')) {
    const item = rawItem.trim();
    if (!item) continue;

    const match = RANGE_ITEM.exec(item);
    if (!match) {
      throw new RangeError(`Invalid page range item: "${item}"`);
    }

    const start = parseInt(match[1], 10);
    const end = match[2] === undefined ? start : parseInt(match[2], 10);
    if (end < start) {
      throw new RangeError(`Invalid page range item: "${item}" (end before start)`);
    }

    // Pages past the end are dropped anyway; don't enumerate them
    for (let page = start; page <= Math.min(end, pageCount); page++) {
      pages.push(page);
    }
  }

  return pages;
}
