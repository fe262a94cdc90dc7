/**
 * Azure Pagination Utilities
 *
 * Azure list operations are cursor paginated: each page carries an optional
 * continuation token naming the next one. A level of the hierarchy is only
 * complete once the last page (no token) has been read.
 */

import { PaginationCursorError } from "./errors.js";
import type { Page } from "./types.js";

/**
 * Fetch pages until the provider stops returning a continuation token.
 *
 * @param fetchPage Fetches one page; receives the token of the page to read,
 *                  or undefined for the first page.
 * @throws PaginationCursorError when the provider hands back a token it
 *         already returned, which would otherwise loop forever.
 */
export async function collectPages<T>(
  fetchPage: (continuationToken: string | undefined) => Promise<Page<T>>,
): Promise<T[]> {
  const items: T[] = [];
  const seen = new Set<string>();
  let token: string | undefined;

  do {
    const page = await fetchPage(token);
    items.push(...page.items);

    token = page.continuationToken || undefined;
    if (token !== undefined) {
      if (seen.has(token)) throw new PaginationCursorError(token);
      seen.add(token);
    }
  } while (token !== undefined);

  return items;
}

/**
 * Exhaust an async iterable (Azure SDK paging iterator), mapping each item.
 */
export async function collectAll<TRaw, TOut>(
  iterator: AsyncIterable<TRaw>,
  mapFn: (item: TRaw) => TOut,
  filterFn?: (item: TOut) => boolean,
): Promise<TOut[]> {
  const items: TOut[] = [];
  for await (const raw of iterator) {
    const mapped = mapFn(raw);
    if (filterFn && !filterFn(mapped)) continue;
    items.push(mapped);
  }
  return items;
}

/**
 * Read the next page from an Azure SDK `byPage()` iterator. Generated ARM
 * clients keep the continuation token off the page array; `getToken` is the
 * package's `getContinuationToken` helper.
 */
export async function readPage<T>(
  pages: AsyncIterator<T[]>,
  getToken: (page: unknown) => string | undefined,
): Promise<Page<T>> {
  const result = await pages.next();
  if (result.done) return { items: [] };
  return { items: [...result.value], continuationToken: getToken(result.value) };
}
