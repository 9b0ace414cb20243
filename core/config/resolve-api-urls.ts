import type { ClientOptions } from '../../types/client-options'
import type { ApiUrls } from '../../types/api-urls'

export const defaultApiUrls: ApiUrls = {
  upload: 'https://uploads.github.com',
  download: 'https://github.com',
  api: 'https://api.github.com',
}

/**
 * Resolve service endpoints from rendered overrides.
 *
 * The upload URL is only taken when an API URL is given; without one it
 * follows the API URL.
 *
 * @param urls - Overrides.
 * @returns Endpoints without trailing slashes.
 * @throws {Error} When an override is not a valid absolute URL.
 */
export function resolveApiUrls(urls: ClientOptions['urls'] = {}): ApiUrls {
  let resolved: ApiUrls = { ...defaultApiUrls }

  if (urls.download) {
    resolved.download = parseUrl(urls.download, 'download')
  }
  if (urls.api) {
    resolved.api = parseUrl(urls.api, 'API')
    resolved.upload =
      urls.upload ? parseUrl(urls.upload, 'upload') : resolved.api
  }

  return resolved
}

function parseUrl(value: string, label: string): string {
  let url: URL
  try {
    url = new URL(value.trim())
  } catch (error) {
    throw new Error(`invalid GitHub ${label} URL "${value}"`, { cause: error })
  }
  return url.href.replace(/\/+$/u, '')
}
