/**
 * Robots Policy Cache
 * Per-origin crawl exclusions, fetched lazily and shared for the whole run
 *
 * Supported subset: flat `Disallow:` prefixes applied to every agent.
 * No `User-agent` groups, no wildcards, no `Allow:`.
 */

import { fetchPage } from './fetcher';
import { extractOrigin, getRequestPath } from './urlNormalizer';
import { FetchLike, RobotsPolicy } from '../types/crawl.types';
import { logger } from '../utils/logger';
import { DEFAULT_ROBOTS_TIMEOUT_MS } from '../config/constants';

const DISALLOW_DIRECTIVE = 'Disallow:';

export interface ParsedRobotsRules {
  disallowAll: boolean;
  disallowedPrefixes: string[];
}

/**
 * Parse robots.txt into a flat list of disallowed prefixes
 *
 * Only lines starting with the case-sensitive `Disallow:` count.
 * An empty value records nothing; `Disallow: /` excludes the origin.
 *
 * @param text - robots.txt body
 */
export function parseRobotsTxt(text: string): ParsedRobotsRules {
  const prefixes = new Set<string>();

  for (const line of text.split(/\r?\n/)) {
    if (!line.startsWith(DISALLOW_DIRECTIVE)) continue;

    const value = line.slice(DISALLOW_DIRECTIVE.length).split('#')[0].trim();
    if (!value) continue;

    prefixes.add(value);
  }

  return {
    disallowAll: prefixes.has('/'),
    disallowedPrefixes: Array.from(prefixes),
  };
}

/**
 * Check a request path against a policy
 *
 * @param policy - Origin policy
 * @param path - Path plus query (e.g. "/private/a?b=1")
 */
export function isPathAllowed(policy: RobotsPolicy, path: string): boolean {
  if (policy.disallowAll) return false;
  return !policy.disallowedPrefixes.some((prefix) => path.startsWith(prefix));
}

export interface RobotsPolicyCacheOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Origin-keyed robots cache with single-flight first fetch
 *
 * The map holds the in-flight promise, so concurrent first lookups of one
 * origin share a single robots.txt download.
 */
export class RobotsPolicyCache {
  private readonly policies = new Map<string, Promise<RobotsPolicy>>();
  private readonly options: RobotsPolicyCacheOptions;
  private fetchCount = 0;

  constructor(options: RobotsPolicyCacheOptions = {}) {
    this.options = options;
  }

  /**
   * Whether the crawler may fetch this URL
   */
  async isAllowed(url: string): Promise<boolean> {
    const policy = await this.getPolicy(extractOrigin(url));
    return isPathAllowed(policy, getRequestPath(url));
  }

  /**
   * Cached policy of an origin, fetching robots.txt on first access
   */
  getPolicy(origin: string): Promise<RobotsPolicy> {
    let policy = this.policies.get(origin);
    if (!policy) {
      policy = this.loadPolicy(origin);
      this.policies.set(origin, policy);
    }
    return policy;
  }

  /**
   * Number of robots.txt downloads started so far
   */
  get robotsFetches(): number {
    return this.fetchCount;
  }

  /**
   * Number of origins with a cached (or in-flight) policy
   */
  get size(): number {
    return this.policies.size;
  }

  private async loadPolicy(origin: string): Promise<RobotsPolicy> {
    this.fetchCount++;
    const robotsUrl = `${origin}/robots.txt`;

    const result = await fetchPage(robotsUrl, this.options.timeoutMs ?? DEFAULT_ROBOTS_TIMEOUT_MS, {
      fetchImpl: this.options.fetchImpl,
      userAgent: this.options.userAgent,
      readBody: () => true,
    });

    if (result.kind !== 'body') {
      const reason =
        result.kind === 'http-error' ? `HTTP ${result.statusCode}` : result.cause;
      logger.debug({ origin, reason }, 'robots.txt unavailable, allowing all paths');
      return {
        origin,
        source: 'unavailable',
        disallowAll: false,
        disallowedPrefixes: [],
        reason,
      };
    }

    const rules = parseRobotsTxt(result.text);
    logger.debug(
      { origin, disallowAll: rules.disallowAll, prefixes: rules.disallowedPrefixes.length },
      'robots.txt loaded'
    );

    return { origin, source: 'fetched', ...rules };
  }
}
