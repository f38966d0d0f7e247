// =============================================================================
// Pagination engine — offset/limit paging until exhaustion or a page ceiling
// =============================================================================

import { ValidationError } from './errors.js';

/** Fetch one page. Same offset and limit must yield the same page. */
export type PageFetcher<T> = (offset: number, limit: number) => Promise<readonly T[]>;

export type Page<T> = {
  index: number;
  offset: number;
  items: readonly T[];
};

export type PaginatedResult<T> = {
  items: T[];
  pages: number;
  /** False when maxPages stopped the walk while pages were still full. */
  complete: boolean;
};

export type PageOptions = {
  pageSize: number;
  maxPages: number;
};

function validate({ pageSize, maxPages }: PageOptions): void {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new ValidationError(`pageSize must be a positive integer, got ${pageSize}`);
  }
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new ValidationError(`maxPages must be a positive integer, got ${maxPages}`);
  }
}

/**
 * Lazy page sequence. Each iteration starts again from offset 0, so the
 * iterable can be walked more than once.
 */
export function paginate<T>(fetchPage: PageFetcher<T>, options: PageOptions): AsyncIterable<Page<T>> {
  validate(options);
  const { pageSize, maxPages } = options;

  return {
    async *[Symbol.asyncIterator]() {
      let offset = 0;
      for (let index = 0; index < maxPages; index++) {
        const items = await fetchPage(offset, pageSize);
        yield { index, offset, items };
        if (items.length < pageSize) return;
        // Advance by what came back, not by what was asked for
        offset += items.length;
      }
    },
  };
}

export async function fetchAllPages<T>(
  fetchPage: PageFetcher<T>,
  pageSize: number,
  maxPages: number,
): Promise<PaginatedResult<T>> {
  const items: T[] = [];
  let pages = 0;
  let lastPageFull = false;

  for await (const page of paginate(fetchPage, { pageSize, maxPages })) {
    pages++;
    items.push(...page.items);
    lastPageFull = page.items.length >= pageSize;
  }

  return { items, pages, complete: !(pages >= maxPages && lastPageFull) };
}
