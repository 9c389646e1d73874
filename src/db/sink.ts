/**
 * MySQL-backed crawl sink
 */

import {
  abortCrawlRun,
  createCrawlRun,
  finishCrawlRun,
  insertCrawlUrl,
  insertCrawlVisit,
} from './queries';
import { CrawlReport, CrawlSink, FrontierEntry, PageVisit } from '../types/crawl.types';
import { CrawlRunInsert } from '../types/database.types';
import { logger } from '../utils/logger';

export class DatabaseSink implements CrawlSink {
  private constructor(readonly runId: string) {}

  /**
   * Create the crawl_runs row and return a sink bound to it
   */
  static async open(run: CrawlRunInsert): Promise<DatabaseSink> {
    logger.info({ runId: run.run_id }, 'Creating crawl run record');
    await createCrawlRun(run);
    return new DatabaseSink(run.run_id);
  }

  async accept(entry: FrontierEntry): Promise<void> {
    await insertCrawlUrl({ run_id: this.runId, url: entry.url, depth: entry.depth });
  }

  async recordVisit(visit: PageVisit): Promise<void> {
    await insertCrawlVisit({
      run_id: this.runId,
      url: visit.url,
      depth: visit.depth,
      round: visit.round,
      outcome: visit.outcome,
      status_code: visit.status,
      content_type: visit.contentType,
      bytes: visit.bytes,
      duration_ms: visit.durationMs,
      links_found: visit.linksFound,
      last_error: visit.error ?? null,
      visited_at: visit.visitedAt,
    });
  }

  async close(report: CrawlReport | null): Promise<void> {
    if (!report) {
      await abortCrawlRun(this.runId);
      return;
    }

    const { stats } = report;
    await finishCrawlRun(this.runId, {
      total_urls_discovered: report.distinctUrls,
      total_dispatched: stats.dispatched,
      total_rounds: stats.rounds,
      total_errors: stats.httpErrors + stats.networkErrors,
      stopped_by: report.stoppedBy,
    });
  }
}
