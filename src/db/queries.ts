/**
 * Database query functions
 * Run bookkeeping only: URLs and visit metadata, never page content
 */

import { getPool } from '../config/database';
import {
  CrawlRunFinish,
  CrawlRunInsert,
  CrawlUrlInsert,
  CrawlVisitInsert,
} from '../types/database.types';

/**
 * Create a new crawl run
 *
 * @param run - Crawl run data
 */
export async function createCrawlRun(run: CrawlRunInsert): Promise<void> {
  const query = `
    INSERT INTO crawl_runs (run_id, query, max_pages, batch_size)
    VALUES (?, ?, ?, ?)
  `;

  await getPool().execute(query, [run.run_id, run.query, run.max_pages, run.batch_size]);
}

/**
 * Record a URL accepted into the frontier
 * A URL is unique per run, so repeats are ignored
 *
 * @param url - Accepted URL
 */
export async function insertCrawlUrl(url: CrawlUrlInsert): Promise<void> {
  const query = `
    INSERT IGNORE INTO crawl_urls (run_id, url, depth)
    VALUES (?, ?, ?)
  `;

  await getPool().execute(query, [url.run_id, url.url, url.depth]);
}

/**
 * Record a dispatched URL and what came of it
 *
 * @param visit - Visit data
 */
export async function insertCrawlVisit(visit: CrawlVisitInsert): Promise<void> {
  const query = `
    INSERT INTO crawl_visits (
      run_id, url, depth, round, outcome, status_code, content_type,
      bytes, duration_ms, links_found, last_error, visited_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `;

  const params = [
    visit.run_id,
    visit.url,
    visit.depth,
    visit.round,
    visit.outcome,
    visit.status_code,
    visit.content_type,
    visit.bytes,
    visit.duration_ms,
    visit.links_found,
    visit.last_error,
    visit.visited_at,
  ];

  await getPool().execute(query, params);
}

/**
 * Finish a crawl run (set finished_at and totals)
 *
 * @param runId - Crawl run UUID
 * @param totals - Final statistics
 */
export async function finishCrawlRun(runId: string, totals: CrawlRunFinish): Promise<void> {
  const query = `
    UPDATE crawl_runs SET
      finished_at = CURRENT_TIMESTAMP,
      total_urls_discovered = ?,
      total_dispatched = ?,
      total_rounds = ?,
      total_errors = ?,
      stopped_by = ?
    WHERE run_id = ?
  `;

  await getPool().execute(query, [
    totals.total_urls_discovered,
    totals.total_dispatched,
    totals.total_rounds,
    totals.total_errors,
    totals.stopped_by,
    runId,
  ]);
}

/**
 * Mark a run that aborted before crawling
 *
 * @param runId - Crawl run UUID
 */
export async function abortCrawlRun(runId: string): Promise<void> {
  const query = 'UPDATE crawl_runs SET finished_at = CURRENT_TIMESTAMP WHERE run_id = ?';
  await getPool().execute(query, [runId]);
}
