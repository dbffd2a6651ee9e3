import { PaginationError } from '../errors.js';
import type { Page } from '../../types/index.js';

export interface CollectPagesOptions<T> {
  keyOf?: (item: T) => string;
  maxPages?: number;
  onPage?: (pageNumber: number, itemCount: number) => void;
}

/**
 * Follows continuation cursors until a page arrives without one. Each item
 * is yielded once: when `keyOf` is given, items re-delivered on a later page
 * are dropped.
 */
export async function collectPages<T>(
  fetchPage: (pageToken: string | undefined) => Promise<Page<T>>,
  options: CollectPagesOptions<T> = {}
): Promise<T[]> {
  const collected: T[] = [];
  const seenKeys = new Set<string>();
  const seenTokens = new Set<string>();
  let pageToken: string | undefined;
  let pageNumber = 0;

  do {
    if (options.maxPages !== undefined && pageNumber >= options.maxPages) {
      throw new PaginationError(`Stopped after ${options.maxPages} pages without reaching the last one`);
    }

    const page = await fetchPage(pageToken);
    pageNumber++;
    options.onPage?.(pageNumber, page.items.length);

    for (const item of page.items) {
      if (options.keyOf) {
        const key = options.keyOf(item);
        if (seenKeys.has(key)) continue;
        seenKeys.add(key);
      }
      collected.push(item);
    }

    pageToken = page.nextPageToken || undefined;
    if (pageToken !== undefined) {
      if (seenTokens.has(pageToken)) {
        throw new PaginationError(`Page token "${pageToken}" was returned twice`);
      }
      seenTokens.add(pageToken);
    }
  } while (pageToken);

  return collected;
}
