export const DEFAULT_RECORD_PATH = /^\/companies\/[a-z0-9-]+$/;

/**
 * Canonical identity key for a detail link, or null when the href is not a
 * record link. Relative hrefs resolve against the origin of `baseUrl`;
 * query, fragment and trailing slashes are dropped; the host must match the
 * base host and the path must match `pathPattern`.
 */
export function normalizeRecordUrl(
  rawHref: string,
  baseUrl: string,
  pathPattern: RegExp = DEFAULT_RECORD_PATH
): string | null {
  const href = rawHref.trim();
  if (!href) return null;

  let base: URL;
  let url: URL;
  try {
    base = new URL(baseUrl);
    url = new URL(href, base.origin);
  } catch {
    return null;
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') return null;
  if (url.hostname !== base.hostname) return null;

  const path = url.pathname.replace(/\/+$/, '');
  if (!pathPattern.test(path)) return null;

  return `${url.origin}${path}`;
}
