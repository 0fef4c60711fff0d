export interface CollectPagesOptions<T> {
  maxResults: number;
  pageSize: number;
  maxPages: number;
  signal?: AbortSignal;
  /** Zero-based page index. An empty page ends the loop. */
  fetchPage(pageIndex: number): Promise<T[]>;
}

/**
 * Request pages one after another until the cap is reached, a page comes
 * back empty or short, the page budget is spent, or the caller aborts.
 */
export async function collectPages<T>(options: CollectPagesOptions<T>): Promise<T[]> {
  const { maxResults, pageSize, maxPages, signal, fetchPage } = options;
  const collected: T[] = [];

  for (let pageIndex = 0; pageIndex < maxPages && collected.length < maxResults; pageIndex++) {
    if (signal?.aborted) {
      break;
    }

    const items = await fetchPage(pageIndex);
    if (items.length === 0) {
      break;
    }

    collected.push(...items);

    if (items.length < pageSize) {
      break;
    }
  }

  return collected;
}
