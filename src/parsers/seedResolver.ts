/**
 * Seed resolution through the Google Custom Search JSON API
 */

import { SearchConfig } from '../config/search';
import { GOOGLE_SEARCH_API_BASE, MAX_SEED_COUNT, USER_AGENT } from '../config/constants';
import { FetchLike, SeedResolver } from '../types/crawl.types';
import { SeedResolutionError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SeedResolverOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  apiBase?: string;
}

/**
 * Build the search request URL
 *
 * @param query - Search keywords
 * @param count - Number of results, clamped to 1..10
 */
export function buildSearchUrl(
  config: SearchConfig,
  query: string,
  count: number,
  apiBase: string = GOOGLE_SEARCH_API_BASE
): string {
  const url = new URL(apiBase);
  url.searchParams.set('key', config.apiKey);
  url.searchParams.set('cx', config.engineId);
  url.searchParams.set('q', query);
  url.searchParams.set('num', String(Math.min(Math.max(1, count), MAX_SEED_COUNT)));
  return url.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pull result URLs out of a search response body
 *
 * `formattedUrl` may lack a scheme, so `link` wins when both are present.
 */
export function parseSearchResponse(body: unknown): string[] {
  if (!isRecord(body)) {
    throw new SeedResolutionError('Search response is not a JSON object');
  }

  const items = body.items;
  if (items === undefined) return [];
  if (!Array.isArray(items)) {
    throw new SeedResolutionError('Search response "items" is not an array');
  }

  const urls: string[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const candidate = typeof item.link === 'string' ? item.link : item.formattedUrl;
    if (typeof candidate !== 'string' || !candidate) continue;
    urls.push(/^https?:\/\//i.test(candidate) ? candidate : `https://${candidate}`);
  }
  return urls;
}

/**
 * Resolve ordered seed URLs for a query
 *
 * @throws SeedResolutionError on any failure, including an empty result list
 */
export async function resolveSeedUrls(
  config: SearchConfig,
  query: string,
  count: number,
  options: SeedResolverOptions = {}
): Promise<string[]> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const requestUrl = buildSearchUrl(config, query, count, options.apiBase);

  let body: unknown;
  try {
    const response = await fetchImpl(requestUrl, {
      signal: AbortSignal.timeout(options.timeoutMs ?? 10000),
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
    });

    if (!response.ok) {
      throw new SeedResolutionError(`Search API responded with HTTP ${response.status}`);
    }

    body = await response.json();
  } catch (error) {
    if (error instanceof SeedResolutionError) throw error;
    throw new SeedResolutionError(`Failed to get results from search API: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const urls = parseSearchResponse(body);
  if (urls.length === 0) {
    throw new SeedResolutionError(`Search API returned no results for "${query}"`);
  }

  logger.info({ query, seeds: urls.length }, 'Seed URLs resolved');
  return urls;
}

/**
 * Bind credentials and transport into the orchestrator's collaborator shape
 */
export function createSeedResolver(
  config: SearchConfig,
  options: SeedResolverOptions = {}
): SeedResolver {
  return (query, count) => resolveSeedUrls(config, query, count, options);
}
