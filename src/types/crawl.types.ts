/**
 * Crawl-related type definitions
 */

/**
 * Subset of the global fetch the crawler depends on
 */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Outcome of a single GET
 */
export type FetchResult =
  | {
      kind: 'body';
      url: string;
      finalUrl: string;
      status: number;
      contentType: string;
      text: string;
      bytes: number;
      durationMs: number;
    }
  | {
      kind: 'http-error';
      url: string;
      statusCode: number;
      durationMs: number;
    }
  | {
      kind: 'network-error';
      url: string;
      cause: string;
      timedOut: boolean;
      durationMs: number;
    };

/**
 * Crawl-exclusion rules of one origin, immutable for the run
 */
export interface RobotsPolicy {
  origin: string;
  source: 'fetched' | 'unavailable';
  disallowAll: boolean;
  disallowedPrefixes: string[];
  reason?: string;
}

/**
 * Frontier entry
 */
export interface FrontierEntry {
  url: string;
  depth: number;
}

export type CrawlState = 'idle' | 'seeding' | 'dispatch' | 'merge' | 'done';

export type StopReason = 'budget' | 'exhausted' | 'cancelled';

export type VisitOutcome = 'html' | 'non-html' | 'http-error' | 'network-error';

/**
 * One dispatched URL, as reported to sinks in visit order
 */
export interface PageVisit {
  url: string;
  depth: number;
  round: number;
  outcome: VisitOutcome;
  status: number | null;
  contentType: string | null;
  bytes: number;
  durationMs: number;
  linksFound: number;
  error?: string;
  visitedAt: Date;
}

/**
 * Receives the stream of accepted URLs and visits
 *
 * `close` gets the final report, or null when the run aborted before crawling.
 */
export interface CrawlSink {
  accept(entry: FrontierEntry): void | Promise<void>;
  recordVisit(visit: PageVisit): void | Promise<void>;
  close(report: CrawlReport | null): Promise<void>;
}

/**
 * Given a query and a result count, return ordered absolute seed URLs
 */
export type SeedResolver = (query: string, count: number) => Promise<string[]>;

/**
 * Given HTML, return raw (possibly relative) anchor links
 */
export type LinkExtractor = (html: string) => Set<string>;

/**
 * Crawl options
 */
export interface CrawlOptions {
  query: string;
  maxPages: number;
  batchSize: number;
  seedCount: number;
  requestTimeoutMs: number;
  robotsTimeoutMs: number;
  maxDepth?: number;
  userAgent?: string;
  signal?: AbortSignal;
}

/**
 * Crawl statistics
 */
export interface CrawlStats {
  seeds: number;
  dispatched: number;
  rounds: number;
  pagesFetched: number;
  nonHtmlPages: number;
  httpErrors: number;
  networkErrors: number;
  robotsBlocked: number;
  extensionFiltered: number;
  depthFiltered: number;
  sinkErrors: number;
}

/**
 * Final crawl report
 */
export interface CrawlReport {
  query: string;
  distinctUrls: number;
  urls: string[];
  stats: CrawlStats;
  stoppedBy: StopReason;
  startTime: Date;
  endTime: Date;
  durationMs: number;
}
