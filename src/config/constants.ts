/**
 * Global constants for the crawler
 */

/**
 * File extensions that are never enqueued
 * Binary and media resources carry no crawlable links; .cgi/.pl are legacy scripts
 */
export const IGNORED_EXTENSIONS: ReadonlySet<string> = new Set([
  // Images
  '.img',
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.bmp',
  '.webp',
  '.svg',
  '.ico',
  '.tif',
  '.tiff',
  // Audio
  '.mp3',
  '.wav',
  '.ogg',
  '.flac',
  '.aac',
  // Video
  '.mp4',
  '.avi',
  '.wmv',
  '.flv',
  '.mov',
  '.mkv',
  '.webm',
  // Archives and binaries
  '.zip',
  '.gz',
  '.tgz',
  '.tar',
  '.rar',
  '.7z',
  '.exe',
  '.dmg',
  '.iso',
  // Legacy scripts
  '.cgi',
  '.pl',
]);

/**
 * URL schemes the crawler follows
 */
export const CRAWLABLE_PROTOCOLS = ['http:', 'https:'];

/**
 * Crawl defaults
 */
export const DEFAULT_MAX_PAGES = 100;
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_SEED_COUNT = 10;
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
export const DEFAULT_ROBOTS_TIMEOUT_MS = 5000;

/**
 * Google Custom Search returns at most 10 results per request
 */
export const MAX_SEED_COUNT = 10;
export const GOOGLE_SEARCH_API_BASE = 'https://www.googleapis.com/customsearch/v1';

/**
 * User agent string
 */
export const USER_AGENT = 'Mozilla/5.0 (compatible; Seedcrawl/1.0)';
