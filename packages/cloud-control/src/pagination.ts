import type { PageRequest } from './requests';
import type { Page } from './responses';

export const DEFAULT_PAGE_SIZE = 100;

/**
 * Walks a paged listing from page 1 until the cursor's last page. A reply without a cursor
 * is treated as the only page.
 */
export async function listAll<T>(
  fetchPage: (page: PageRequest) => Promise<Page<T>>,
  perPage: number = DEFAULT_PAGE_SIZE,
): Promise<T[]> {
  const items: T[] = [];
  for (let page = 1; ; page += 1) {
    const reply = await fetchPage({ page, perPage });
    items.push(...reply.data);
    const last = reply.cursor?.pages?.last ?? page;
    if (page >= last || reply.data.length === 0) return items;
  }
}
