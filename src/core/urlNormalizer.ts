/**
 * URL Normalizer
 * All deduplication depends on consistent URL normalization
 *
 * The identity of a page = normalized absolute URL (fragment stripped, query kept)
 */

import { CRAWLABLE_PROTOCOLS, IGNORED_EXTENSIONS } from '../config/constants';

/**
 * Normalize a raw link into an absolute URL key
 *
 * Rules (applied in order):
 * 1. Trim; empty links yield null
 * 2. Resolve against the base page (a link with its own host keeps it)
 * 3. Keep http(s) only
 * 4. Lowercase hostname (done by the URL API)
 * 5. Remove fragment (#)
 *
 * Path and query are kept verbatim so robots prefixes match what the server sees.
 *
 * @param raw - Link as found in the document
 * @param base - Absolute URL of the page the link was found on
 * @returns Normalized URL, or null when the link cannot be crawled
 */
export function normalizeUrl(raw: string, base?: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  let urlObj: URL;
  try {
    urlObj = base ? new URL(trimmed, base) : new URL(trimmed);
  } catch {
    return null;
  }

  if (!CRAWLABLE_PROTOCOLS.includes(urlObj.protocol)) return null;
  if (!urlObj.hostname) return null;

  urlObj.hash = '';
  return urlObj.toString();
}

/**
 * Lowercased file extension of the URL's last path segment, including the dot
 *
 * @returns Extension (e.g. ".png") or empty string
 */
export function getFileExtension(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return '';
  }

  const lastSegment = pathname.slice(pathname.lastIndexOf('/') + 1);
  const dot = lastSegment.lastIndexOf('.');
  if (dot <= 0) return '';

  return lastSegment.slice(dot).toLowerCase();
}

/**
 * Check the URL against the binary/media ignore-list
 */
export function hasIgnoredExtension(url: string): boolean {
  return IGNORED_EXTENSIONS.has(getFileExtension(url));
}

/**
 * Extract origin (scheme + host + port) from URL
 *
 * @param url - Absolute URL
 * @returns Origin (e.g., "https://example.com")
 */
export function extractOrigin(url: string): string {
  return new URL(url).origin;
}

/**
 * Path plus query, as matched by robots rules
 *
 * @param url - Absolute URL
 * @returns Request path (e.g., "/about/team?lang=en")
 */
export function getRequestPath(url: string): string {
  const urlObj = new URL(url);
  return `${urlObj.pathname}${urlObj.search}`;
}
