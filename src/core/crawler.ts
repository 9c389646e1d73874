/**
 * Crawl orchestrator
 * Batch-synchronous breadth-first crawl: dispatch a slice, join, merge, repeat
 */

import pLimit from 'p-limit';
import { Frontier } from './frontier';
import { fetchPage, isHtmlContentType } from './fetcher';
import { RobotsPolicyCache } from './robotsPolicy';
import { hasIgnoredExtension, normalizeUrl } from './urlNormalizer';
import { extractLinks as extractAnchorLinks } from '../parsers/linkExtractor';
import {
  CrawlOptions,
  CrawlReport,
  CrawlSink,
  CrawlState,
  CrawlStats,
  FetchLike,
  FrontierEntry,
  LinkExtractor,
  PageVisit,
  SeedResolver,
  StopReason,
} from '../types/crawl.types';
import { SeedResolutionError, errorMessage } from '../utils/errors';
import { logger, logBatchProgress, logAbsorbedFailure } from '../utils/logger';

/**
 * Collaborators injected into the orchestrator
 */
export interface CrawlDependencies {
  resolveSeeds: SeedResolver;
  extractLinks?: LinkExtractor;
  fetchImpl?: FetchLike;
  robots?: RobotsPolicyCache;
  sinks?: CrawlSink[];
}

/**
 * What one dispatched URL produced
 */
interface PageOutcome {
  entry: FrontierEntry;
  visit: PageVisit;
  discovered: string[];
  robotsBlocked: number;
  extensionFiltered: number;
  depthFiltered: number;
}

function emptyStats(): CrawlStats {
  return {
    seeds: 0,
    dispatched: 0,
    rounds: 0,
    pagesFetched: 0,
    nonHtmlPages: 0,
    httpErrors: 0,
    networkErrors: 0,
    robotsBlocked: 0,
    extensionFiltered: 0,
    depthFiltered: 0,
    sinkErrors: 0,
  };
}

export class CrawlOrchestrator {
  private readonly options: CrawlOptions;
  private readonly resolveSeeds: SeedResolver;
  private readonly extractLinks: LinkExtractor;
  private readonly fetchImpl?: FetchLike;
  private readonly robots: RobotsPolicyCache;
  private readonly sinks: CrawlSink[];
  // Page and robots.txt requests share one limiter: batchSize bounds what is in flight
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly frontier = new Frontier();
  private readonly stats: CrawlStats = emptyStats();
  private currentState: CrawlState = 'idle';

  constructor(options: CrawlOptions, deps: CrawlDependencies) {
    if (!Number.isInteger(options.maxPages) || options.maxPages < 0) {
      throw new RangeError(`maxPages must be a non-negative integer, got ${options.maxPages}`);
    }
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${options.batchSize}`);
    }

    this.options = options;
    this.resolveSeeds = deps.resolveSeeds;
    this.extractLinks = deps.extractLinks ?? extractAnchorLinks;
    this.fetchImpl = deps.fetchImpl;
    this.robots =
      deps.robots ??
      new RobotsPolicyCache({
        fetchImpl: deps.fetchImpl,
        timeoutMs: options.robotsTimeoutMs,
        userAgent: options.userAgent,
      });
    this.sinks = deps.sinks ?? [];
    this.limit = pLimit(options.batchSize);
  }

  get state(): CrawlState {
    return this.currentState;
  }

  /**
   * Run the crawl to completion
   *
   * @throws SeedResolutionError when no seed URL can be obtained
   */
  async run(): Promise<CrawlReport> {
    if (this.currentState !== 'idle') {
      throw new Error('A crawl orchestrator can only run once');
    }

    const startTime = new Date();
    let report: CrawlReport | null = null;

    try {
      await this.seed();
      const stoppedBy = await this.crawlLoop();

      const endTime = new Date();
      report = {
        query: this.options.query,
        distinctUrls: this.frontier.size,
        urls: this.frontier.urls(),
        stats: { ...this.stats },
        stoppedBy,
        startTime,
        endTime,
        durationMs: endTime.getTime() - startTime.getTime(),
      };

      logger.info(
        {
          query: report.query,
          stats: report.stats,
          distinctUrls: report.distinctUrls,
          stoppedBy,
          durationSec: Math.round(report.durationMs / 1000),
        },
        'Crawl completed'
      );

      return report;
    } finally {
      this.currentState = 'done';
      await this.closeSinks(report);
    }
  }

  private async seed(): Promise<void> {
    this.currentState = 'seeding';
    const { query, seedCount } = this.options;

    logger.info({ query, seedCount }, 'Resolving seed URLs');
    const rawSeeds = await this.resolveSeeds(query, seedCount);

    const crawlable: string[] = [];
    for (const raw of rawSeeds) {
      const url = normalizeUrl(raw);
      if (!url) {
        logger.warn({ url: raw }, 'Skipping invalid seed URL');
        continue;
      }
      if (hasIgnoredExtension(url)) {
        logger.debug({ url }, 'Skipping seed with ignored extension');
        this.stats.extensionFiltered++;
        continue;
      }
      crawlable.push(url);
    }

    const accepted = this.frontier.enqueueAll(crawlable, 0);

    if (accepted.length === 0) {
      throw new SeedResolutionError(`None of the ${rawSeeds.length} seed URL(s) can be crawled`);
    }

    this.stats.seeds = accepted.length;
    await this.forwardToSinks(accepted, (sink, entry) => sink.accept(entry));

    logger.info({ seeds: accepted.length }, 'Frontier seeded');
  }

  private async crawlLoop(): Promise<StopReason> {
    const { maxPages, batchSize, signal } = this.options;

    for (;;) {
      this.currentState = 'dispatch';

      const remaining = maxPages - this.stats.dispatched;
      if (remaining <= 0) return 'budget';
      if (this.frontier.pendingCount === 0) return 'exhausted';
      if (signal?.aborted) {
        logger.info({ dispatched: this.stats.dispatched }, 'Crawl cancelled, not dispatching more batches');
        return 'cancelled';
      }

      const batch = this.frontier.takeBatch(Math.min(batchSize, remaining));
      this.stats.dispatched += batch.length;
      this.stats.rounds++;
      const round = this.stats.rounds;

      logger.debug({ round, size: batch.length }, 'Dispatching batch');
      const outcomes = await Promise.all(batch.map((entry) => this.processEntry(entry, round)));

      this.currentState = 'merge';
      await this.merge(outcomes);

      logBatchProgress({
        round,
        dispatched: this.stats.dispatched,
        budget: maxPages,
        discovered: this.frontier.size,
        pending: this.frontier.pendingCount,
      });
    }
  }

  /**
   * Fetch, extract, normalize and robots-check one URL
   *
   * Never rejects: every failure becomes an outcome with no discovered links.
   */
  private async processEntry(entry: FrontierEntry, round: number): Promise<PageOutcome> {
    const result = await this.limit(() =>
      fetchPage(entry.url, this.options.requestTimeoutMs, {
        fetchImpl: this.fetchImpl,
        userAgent: this.options.userAgent,
      })
    );
    const visitedAt = new Date();

    const outcome: PageOutcome = {
      entry,
      visit: {
        url: entry.url,
        depth: entry.depth,
        round,
        outcome: 'html',
        status: null,
        contentType: null,
        bytes: 0,
        durationMs: result.durationMs,
        linksFound: 0,
        visitedAt,
      },
      discovered: [],
      robotsBlocked: 0,
      extensionFiltered: 0,
      depthFiltered: 0,
    };

    if (result.kind === 'http-error') {
      logAbsorbedFailure(entry.url, result.kind, result.statusCode);
      outcome.visit.outcome = 'http-error';
      outcome.visit.status = result.statusCode;
      outcome.visit.error = `HTTP ${result.statusCode}`;
      return outcome;
    }

    if (result.kind === 'network-error') {
      logAbsorbedFailure(entry.url, result.timedOut ? 'timeout' : result.kind, result.cause);
      outcome.visit.outcome = 'network-error';
      outcome.visit.error = result.cause;
      return outcome;
    }

    outcome.visit.status = result.status;
    outcome.visit.contentType = result.contentType;
    outcome.visit.bytes = result.bytes;

    if (!isHtmlContentType(result.contentType)) {
      logger.debug({ url: entry.url, contentType: result.contentType }, 'Skipping non-HTML page');
      outcome.visit.outcome = 'non-html';
      return outcome;
    }

    let rawLinks: Set<string>;
    try {
      rawLinks = this.extractLinks(result.text);
    } catch (error) {
      logAbsorbedFailure(entry.url, 'extraction-error', errorMessage(error));
      return outcome;
    }

    const candidates = new Set<string>();
    for (const raw of rawLinks) {
      const url = normalizeUrl(raw, result.finalUrl);
      if (!url) continue;
      if (hasIgnoredExtension(url)) {
        outcome.extensionFiltered++;
        continue;
      }
      candidates.add(url);
    }
    outcome.visit.linksFound = candidates.size;

    const { maxDepth } = this.options;
    if (maxDepth !== undefined && entry.depth + 1 > maxDepth) {
      outcome.depthFiltered = candidates.size;
      return outcome;
    }

    // The frontier is not written until the merge, so reading it here is stable
    const unseen = Array.from(candidates).filter((url) => !this.frontier.has(url));
    const checks = await Promise.all(
      unseen.map((url) => this.limit(async () => ({ url, allowed: await this.robots.isAllowed(url) })))
    );

    for (const { url, allowed } of checks) {
      if (allowed) {
        outcome.discovered.push(url);
      } else {
        outcome.robotsBlocked++;
      }
    }

    logger.debug(
      { url: entry.url, links: candidates.size, accepted: outcome.discovered.length },
      'Page crawled'
    );

    return outcome;
  }

  /**
   * Union the batch's discoveries into the frontier, in dispatch order
   */
  private async merge(outcomes: PageOutcome[]): Promise<void> {
    const accepted: FrontierEntry[] = [];

    for (const outcome of outcomes) {
      this.countVisit(outcome);
      accepted.push(...this.frontier.enqueueAll(outcome.discovered, outcome.entry.depth + 1));
    }

    const visits = outcomes
      .map((outcome) => outcome.visit)
      .sort((a, b) => a.visitedAt.getTime() - b.visitedAt.getTime());

    await this.forwardToSinks(visits, (sink, visit) => sink.recordVisit(visit));
    await this.forwardToSinks(accepted, (sink, entry) => sink.accept(entry));
  }

  private countVisit(outcome: PageOutcome): void {
    switch (outcome.visit.outcome) {
      case 'html':
        this.stats.pagesFetched++;
        break;
      case 'non-html':
        this.stats.nonHtmlPages++;
        break;
      case 'http-error':
        this.stats.httpErrors++;
        break;
      case 'network-error':
        this.stats.networkErrors++;
        break;
    }
    this.stats.robotsBlocked += outcome.robotsBlocked;
    this.stats.extensionFiltered += outcome.extensionFiltered;
    this.stats.depthFiltered += outcome.depthFiltered;
  }

  private async forwardToSinks<T extends { url: string }>(
    items: T[],
    deliver: (sink: CrawlSink, item: T) => void | Promise<void>
  ): Promise<void> {
    for (const sink of this.sinks) {
      for (const item of items) {
        try {
          await deliver(sink, item);
        } catch (error) {
          this.stats.sinkErrors++;
          logger.error({ url: item.url, error: errorMessage(error) }, 'Sink failed');
        }
      }
    }
  }

  private async closeSinks(report: CrawlReport | null): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await sink.close(report);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to close sink');
      }
    }
  }
}

/**
 * Run a crawl with the given options
 *
 * @param options - Crawl configuration
 * @param deps - Collaborators (seed resolution, transport, sinks)
 * @returns Crawl report
 */
export async function runCrawl(options: CrawlOptions, deps: CrawlDependencies): Promise<CrawlReport> {
  return new CrawlOrchestrator(options, deps).run();
}
