/**
 * Database type definitions
 * Corresponds to MySQL schema in src/db/schema.sql
 */

import { StopReason, VisitOutcome } from './crawl.types';

/**
 * Insert type for crawl_runs
 */
export interface CrawlRunInsert {
  run_id: string;
  query: string;
  max_pages: number;
  batch_size: number;
}

/**
 * Final statistics written when a run finishes
 */
export interface CrawlRunFinish {
  total_urls_discovered: number;
  total_dispatched: number;
  total_rounds: number;
  total_errors: number;
  stopped_by: StopReason;
}

/**
 * Insert type for crawl_urls (accepted into the frontier)
 */
export interface CrawlUrlInsert {
  run_id: string;
  url: string;
  depth: number;
}

/**
 * Insert type for crawl_visits (one per dispatched URL)
 */
export interface CrawlVisitInsert {
  run_id: string;
  url: string;
  depth: number;
  round: number;
  outcome: VisitOutcome;
  status_code: number | null;
  content_type: string | null;
  bytes: number;
  duration_ms: number;
  links_found: number;
  last_error: string | null;
  visited_at: Date;
}
