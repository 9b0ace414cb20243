/**
 * Percent-encodes each segment of a slash separated path, keeping the
 * slashes.
 *
 * @param path - File path or ref name.
 * @returns Path safe to interpolate into a URL.
 */
export function encodePath(path: string): string {
  return path
    .split('/')
    .map(segment => encodeURIComponent(segment))
    .join('/')
}
