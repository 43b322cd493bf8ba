/**
 * Cursor-driven pagination utilities
 */

export interface PageResult<T> {
  items: T[];
  /** Cursor for the next page, or null when the source reports no more pages */
  next: string | null;
}

export type PageFetcher<T> = (cursor: string | null) => Promise<PageResult<T>>;

/**
 * Raised when a source hands back a cursor it already returned, which would
 * otherwise loop forever.
 */
export class RepeatedCursorError extends Error {
  cursor: string;

  constructor(cursor: string) {
    super(`Pagination cursor repeated: ${cursor}`);
    this.name = "RepeatedCursorError";
    this.cursor = cursor;
  }
}

/**
 * Visit every page in order, starting from a null cursor.
 *
 * Termination is driven only by the source's `next` signal; there is no page
 * count limit. Returns the number of pages fetched.
 */
export async function forEachPage<T>(
  fetchPage: PageFetcher<T>,
  visit: (items: T[], pageNumber: number) => void | Promise<void>
): Promise<number> {
  const seen = new Set<string>();
  let cursor: string | null = null;
  let pages = 0;

  do {
    const page: PageResult<T> = await fetchPage(cursor);
    pages++;
    await visit(page.items, pages);

    cursor = page.next;
    if (cursor !== null) {
      if (seen.has(cursor)) {
        throw new RepeatedCursorError(cursor);
      }
      seen.add(cursor);
    }
  } while (cursor !== null);

  return pages;
}

/**
 * Accumulate the items of every page into one array
 */
export async function collectPages<T>(fetchPage: PageFetcher<T>): Promise<T[]> {
  const items: T[] = [];
  await forEachPage(fetchPage, (pageItems) => {
    items.push(...pageItems);
  });
  return items;
}
