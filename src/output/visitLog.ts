/**
 * JSON Lines visit log
 *
 * One line per accepted URL and per visit, in the order the crawler reports
 * them, followed by a summary line when the run completes.
 */

import fs from 'fs';
import { finished } from 'stream/promises';
import { CrawlReport, CrawlSink, FrontierEntry, PageVisit } from '../types/crawl.types';

export type VisitLogLine =
  | ({ type: 'url' } & FrontierEntry)
  | ({ type: 'visit' } & Omit<PageVisit, 'visitedAt'> & { visitedAt: string })
  | {
      type: 'summary';
      query: string;
      distinctUrls: number;
      dispatched: number;
      stoppedBy: CrawlReport['stoppedBy'];
      durationMs: number;
    };

export class VisitLogSink implements CrawlSink {
  private readonly stream: fs.WriteStream;
  private streamError: Error | null = null;

  constructor(readonly filePath: string) {
    this.stream = fs.createWriteStream(filePath, { flags: 'w', encoding: 'utf-8' });
    this.stream.on('error', (error) => {
      this.streamError = error;
    });
  }

  accept(entry: FrontierEntry): void {
    this.write({ type: 'url', url: entry.url, depth: entry.depth });
  }

  recordVisit(visit: PageVisit): void {
    this.write({ type: 'visit', ...visit, visitedAt: visit.visitedAt.toISOString() });
  }

  async close(report: CrawlReport | null): Promise<void> {
    if (report) {
      this.write({
        type: 'summary',
        query: report.query,
        distinctUrls: report.distinctUrls,
        dispatched: report.stats.dispatched,
        stoppedBy: report.stoppedBy,
        durationMs: report.durationMs,
      });
    }

    this.stream.end();
    await finished(this.stream);
  }

  private write(line: VisitLogLine): void {
    if (this.streamError) {
      throw this.streamError;
    }
    this.stream.write(`${JSON.stringify(line)}\n`);
  }
}
