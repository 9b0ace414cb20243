import type { Page } from '../../types/page'

/**
 * Lazily walk a cursor-paginated listing.
 *
 * Pages are fetched strictly in cursor order and only as items are
 * consumed, so a caller that stops iterating (`break`, `return`) stops the
 * fetching as well. The walk ends when a page reports a next cursor of 0.
 *
 * @param fetchPage - Loads the page for a cursor.
 * @param firstPage - Cursor of the first page.
 * @yields Items in remote order.
 */
export async function* paginate<T>(
  fetchPage: (page: number) => Promise<Page<T>>,
  firstPage: number = 1,
): AsyncGenerator<T, void, undefined> {
  let page = firstPage
  for (;;) {
    let result = await fetchPage(page)
    yield* result.items
    if (result.nextPage === 0) {
      return
    }
    page = result.nextPage
  }
}
