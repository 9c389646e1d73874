#!/usr/bin/env node

/**
 * CLI entry point for the crawler
 */

import { Command, InvalidArgumentError } from 'commander';
import { v4 as uuidv4 } from 'uuid';
import * as dotenv from 'dotenv';
import { runCrawl } from './core/crawler';
import { createSeedResolver } from './parsers/seedResolver';
import { loadSearchConfig } from './config/search';
import { testConnection, closePool } from './config/database';
import { DatabaseSink } from './db/sink';
import { VisitLogSink } from './output/visitLog';
import { CrawlOptions, CrawlReport, CrawlSink } from './types/crawl.types';
import { ConfigurationError, SeedResolutionError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_PAGES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_ROBOTS_TIMEOUT_MS,
  DEFAULT_SEED_COUNT,
} from './config/constants';

// Load environment variables
dotenv.config();

interface CliOptions {
  keyword: string;
  budget: number;
  batchSize: number;
  seedCount: number;
  maxDepth?: number;
  timeout: number;
  robotsTimeout: number;
  maxDuration?: number;
  output?: string;
  db?: boolean;
  printUrls?: boolean;
  debug?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('seedcrawl')
  .description('Bounded, polite breadth-first crawler seeded from a search query')
  .version('1.0.0')
  .requiredOption('-k, --keyword <query>', 'Search keyword used to resolve seed pages')
  .option('-b, --budget <number>', 'Maximum URLs to dispatch', parsePositiveInt, DEFAULT_MAX_PAGES)
  .option('--batch-size <number>', 'URLs fetched concurrently per round', parsePositiveInt, DEFAULT_BATCH_SIZE)
  .option('-n, --seed-count <number>', 'Search results used as seeds (1-10)', parsePositiveInt, DEFAULT_SEED_COUNT)
  .option('--max-depth <number>', 'Maximum link hops from a seed page', parseNonNegativeInt)
  .option('--timeout <ms>', 'Per-request timeout', parsePositiveInt, DEFAULT_REQUEST_TIMEOUT_MS)
  .option('--robots-timeout <ms>', 'robots.txt request timeout', parsePositiveInt, DEFAULT_ROBOTS_TIMEOUT_MS)
  .option('--max-duration <seconds>', 'Stop dispatching new batches after this long', parsePositiveInt)
  .option('-o, --output <file>', 'Write a JSON Lines visit log')
  .option('--db', 'Record the run in MySQL')
  .option('--print-urls', 'Print every discovered URL')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (options: CliOptions) => {
    process.exitCode = await main(options);
  });

/**
 * Main crawl execution
 *
 * @returns Process exit code
 */
async function main(cliOptions: CliOptions): Promise<number> {
  if (cliOptions.debug) {
    logger.level = 'debug';
  }

  logger.info({ options: cliOptions }, 'Seedcrawl starting');

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupted, finishing current batch');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const deadline = cliOptions.maxDuration
    ? setTimeout(() => {
        logger.warn({ maxDurationSec: cliOptions.maxDuration }, 'Time limit reached, finishing current batch');
        controller.abort();
      }, cliOptions.maxDuration * 1000)
    : undefined;
  deadline?.unref();

  try {
    const searchConfig = loadSearchConfig();
    const sinks = await openSinks(cliOptions);

    const crawlOptions: CrawlOptions = {
      query: cliOptions.keyword,
      maxPages: cliOptions.budget,
      batchSize: cliOptions.batchSize,
      seedCount: cliOptions.seedCount,
      maxDepth: cliOptions.maxDepth,
      requestTimeoutMs: cliOptions.timeout,
      robotsTimeoutMs: cliOptions.robotsTimeout,
      signal: controller.signal,
    };

    const report = await runCrawl(crawlOptions, {
      resolveSeeds: createSeedResolver(searchConfig),
      sinks,
    });

    displaySummary(report, cliOptions.printUrls === true);
    return 0;
  } catch (error) {
    if (error instanceof SeedResolutionError) {
      console.error(`[${error.name}]: ${error.message}`);
      return 0;
    }
    if (error instanceof ConfigurationError) {
      console.error(`[${error.name}]: ${error.message}`);
      return 1;
    }
    logger.error({ error: errorMessage(error) }, 'Crawl failed');
    return 1;
  } finally {
    clearTimeout(deadline);
    process.removeListener('SIGINT', onSigint);
    if (cliOptions.db) {
      await closePool();
    }
  }
}

/**
 * Open the sinks requested on the command line
 */
async function openSinks(cliOptions: CliOptions): Promise<CrawlSink[]> {
  const sinks: CrawlSink[] = [];

  if (cliOptions.db) {
    try {
      await testConnection();
    } catch (error) {
      throw new ConfigurationError(`Database unreachable: ${errorMessage(error)}`, { cause: error });
    }
    sinks.push(
      await DatabaseSink.open({
        run_id: uuidv4(),
        query: cliOptions.keyword,
        max_pages: cliOptions.budget,
        batch_size: cliOptions.batchSize,
      })
    );
  }

  if (cliOptions.output) {
    sinks.push(new VisitLogSink(cliOptions.output));
  }

  return sinks;
}

/**
 * Display crawl summary
 */
function displaySummary(report: CrawlReport, printUrls: boolean) {
  const { stats } = report;

  if (printUrls) {
    report.urls.forEach((url) => console.log(url));
  }

  console.log('\n' + '='.repeat(60));
  console.log('Crawl Complete');
  console.log('='.repeat(60));
  console.log(`Query: ${report.query}`);
  console.log('');
  console.log('Statistics:');
  console.log(`  • Seeds:                  ${stats.seeds.toLocaleString()}`);
  console.log(`  • Dispatched:             ${stats.dispatched.toLocaleString()} in ${stats.rounds} round(s)`);
  console.log(`  • HTML pages parsed:      ${stats.pagesFetched.toLocaleString()}`);
  console.log(`  • Non-HTML pages:         ${stats.nonHtmlPages.toLocaleString()}`);
  console.log(`  • Fetch errors:           ${(stats.httpErrors + stats.networkErrors).toLocaleString()}`);
  console.log(`  • Blocked by robots.txt:  ${stats.robotsBlocked.toLocaleString()}`);
  console.log(`  • Stopped by:             ${report.stoppedBy}`);
  console.log('');
  console.log(`Time elapsed: ${(report.durationMs / 1000).toFixed(3)}s, ${report.distinctUrls} URLs found`);
  console.log('='.repeat(60) + '\n');
}

// Parse CLI arguments
program.parseAsync().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Unexpected failure');
  process.exitCode = 1;
});
