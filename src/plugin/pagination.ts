import type { Page } from './types.js';

export const DEFAULT_PAGE_SIZE = 50;

export type PageFetcher<T> = (page: number, perPage: number) => Promise<Page<T>>;

export interface PaginateOptions {
  perPage?: number;
  /** Checked after every page; returning true stops before the next request */
  isDone?: () => boolean;
}

/**
 * Walk a page-numbered list endpoint from page 1, streaming every item,
 * until the endpoint reports no next page.
 *
 * @returns the number of requests made
 */
export async function paginate<T>(
  fetchPage: PageFetcher<T>,
  sink: (item: T) => void,
  options: PaginateOptions = {}
): Promise<number> {
  const perPage = options.perPage ?? DEFAULT_PAGE_SIZE;
  let page = 1;
  let requests = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    const result = await fetchPage(page, perPage);
    requests++;

    for (const item of result.items) {
      sink(item);
    }

    if (result.nextPage === 0 || options.isDone?.()) {
      break;
    }
    page = result.nextPage;
  }

  return requests;
}
