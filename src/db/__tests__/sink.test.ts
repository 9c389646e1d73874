/**
 * Database Sink Tests
 * Query functions are mocked; no MySQL server is involved
 */

import { DatabaseSink } from '../sink';
import {
  abortCrawlRun,
  createCrawlRun,
  finishCrawlRun,
  insertCrawlUrl,
  insertCrawlVisit,
} from '../queries';
import { CrawlReport } from '../../types/crawl.types';

jest.mock('../queries', () => ({
  createCrawlRun: jest.fn(),
  insertCrawlUrl: jest.fn(),
  insertCrawlVisit: jest.fn(),
  finishCrawlRun: jest.fn(),
  abortCrawlRun: jest.fn(),
}));

const RUN_ID = '00000000-0000-4000-8000-000000000001';

describe('DatabaseSink', () => {
  let sink: DatabaseSink;

  beforeEach(async () => {
    jest.clearAllMocks();
    sink = await DatabaseSink.open({ run_id: RUN_ID, query: 'test query', max_pages: 10, batch_size: 3 });
  });

  it('creates the run record on open', () => {
    expect(createCrawlRun).toHaveBeenCalledWith({
      run_id: RUN_ID,
      query: 'test query',
      max_pages: 10,
      batch_size: 3,
    });
    expect(sink.runId).toBe(RUN_ID);
  });

  it('stores accepted URLs', async () => {
    await sink.accept({ url: 'http://a.com/b', depth: 2 });

    expect(insertCrawlUrl).toHaveBeenCalledWith({ run_id: RUN_ID, url: 'http://a.com/b', depth: 2 });
  });

  it('maps visits onto crawl_visits columns', async () => {
    const visitedAt = new Date('2024-05-01T10:00:00.000Z');

    await sink.recordVisit({
      url: 'http://a.com/down',
      depth: 1,
      round: 2,
      outcome: 'http-error',
      status: 503,
      contentType: null,
      bytes: 0,
      durationMs: 15,
      linksFound: 0,
      error: 'HTTP 503',
      visitedAt,
    });

    expect(insertCrawlVisit).toHaveBeenCalledWith({
      run_id: RUN_ID,
      url: 'http://a.com/down',
      depth: 1,
      round: 2,
      outcome: 'http-error',
      status_code: 503,
      content_type: null,
      bytes: 0,
      duration_ms: 15,
      links_found: 0,
      last_error: 'HTTP 503',
      visited_at: visitedAt,
    });
  });

  it('finishes the run with totals', async () => {
    const now = new Date();
    const report: CrawlReport = {
      query: 'test query',
      distinctUrls: 25,
      urls: [],
      stats: {
        seeds: 3,
        dispatched: 10,
        rounds: 4,
        pagesFetched: 6,
        nonHtmlPages: 1,
        httpErrors: 2,
        networkErrors: 1,
        robotsBlocked: 0,
        extensionFiltered: 0,
        depthFiltered: 0,
        sinkErrors: 0,
      },
      stoppedBy: 'budget',
      startTime: now,
      endTime: now,
      durationMs: 0,
    };

    await sink.close(report);

    expect(finishCrawlRun).toHaveBeenCalledWith(RUN_ID, {
      total_urls_discovered: 25,
      total_dispatched: 10,
      total_rounds: 4,
      total_errors: 3,
      stopped_by: 'budget',
    });
    expect(abortCrawlRun).not.toHaveBeenCalled();
  });

  it('marks the run aborted when there is no report', async () => {
    await sink.close(null);

    expect(abortCrawlRun).toHaveBeenCalledWith(RUN_ID);
    expect(finishCrawlRun).not.toHaveBeenCalled();
  });
});
