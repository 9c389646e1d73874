/**
 * Frontier
 * FIFO log of every URL ever discovered, drained in batches by a cursor
 *
 * A URL enters the seen-set when it is first discovered, not when it is
 * fetched, and never leaves it.
 */

import { FrontierEntry } from '../types/crawl.types';

export class Frontier {
  private readonly entries: FrontierEntry[] = [];
  private readonly seen = new Set<string>();
  private cursor = 0;

  /**
   * Add a normalized URL
   *
   * @returns True if the URL was new
   */
  enqueue(url: string, depth: number): boolean {
    if (this.seen.has(url)) return false;

    this.seen.add(url);
    this.entries.push({ url, depth });
    return true;
  }

  /**
   * Add URLs in order, skipping those already seen
   *
   * @returns The entries that were new
   */
  enqueueAll(urls: Iterable<string>, depth: number): FrontierEntry[] {
    const added: FrontierEntry[] = [];
    for (const url of urls) {
      if (this.enqueue(url, depth)) {
        added.push({ url, depth });
      }
    }
    return added;
  }

  /**
   * Take the next slice of not-yet-dispatched entries
   *
   * @param size - Upper bound on the slice length
   */
  takeBatch(size: number): FrontierEntry[] {
    if (size <= 0) return [];
    const batch = this.entries.slice(this.cursor, this.cursor + size);
    this.cursor += batch.length;
    return batch;
  }

  has(url: string): boolean {
    return this.seen.has(url);
  }

  /**
   * Total distinct URLs discovered (pending and dispatched)
   */
  get size(): number {
    return this.entries.length;
  }

  get pendingCount(): number {
    return this.entries.length - this.cursor;
  }

  /**
   * All discovered URLs in discovery order
   */
  urls(): string[] {
    return this.entries.map((entry) => entry.url);
  }
}
