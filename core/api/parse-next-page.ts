/**
 * Extract the `page` cursor of the `rel="next"` entry of a Link header.
 *
 * @param link - Raw Link header value.
 * @returns Next page number, or 0 when there is none.
 */
export function parseNextPage(link: string | null): number {
  if (!link) {
    return 0
  }

  for (let entry of link.split(',')) {
    let match = entry.match(/<(?<url>[^>]+)>\s*;\s*rel="?next"?/u)
    let url = match?.groups?.['url']
    if (!url) {
      continue
    }

    let page = new URL(url, 'https://localhost').searchParams.get('page')
    let parsed = page ? Number.parseInt(page, 10) : Number.NaN
    return Number.isFinite(parsed) && parsed > 0 ? parsed : 0
  }

  return 0
}
