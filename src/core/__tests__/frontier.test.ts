/**
 * Frontier Tests
 */

import { Frontier } from '../frontier';

describe('Frontier', () => {
  let frontier: Frontier;

  beforeEach(() => {
    frontier = new Frontier();
  });

  describe('enqueue', () => {
    it('accepts a URL once', () => {
      expect(frontier.enqueue('http://a.com/', 0)).toBe(true);
      expect(frontier.enqueue('http://a.com/', 1)).toBe(false);

      expect(frontier.size).toBe(1);
      expect(frontier.has('http://a.com/')).toBe(true);
    });

    it('rejects a URL that was already dispatched', () => {
      frontier.enqueue('http://a.com/', 0);
      frontier.takeBatch(1);

      expect(frontier.enqueue('http://a.com/', 1)).toBe(false);
      expect(frontier.pendingCount).toBe(0);
    });
  });

  describe('enqueueAll', () => {
    it('returns only the new entries, in order', () => {
      frontier.enqueue('http://a.com/b', 0);

      const added = frontier.enqueueAll(['http://a.com/c', 'http://a.com/b', 'http://a.com/c', 'http://a.com/d'], 1);

      expect(added).toEqual([
        { url: 'http://a.com/c', depth: 1 },
        { url: 'http://a.com/d', depth: 1 },
      ]);
      expect(frontier.urls()).toEqual(['http://a.com/b', 'http://a.com/c', 'http://a.com/d']);
    });
  });

  describe('takeBatch', () => {
    beforeEach(() => {
      frontier.enqueueAll(['http://a.com/1', 'http://a.com/2', 'http://a.com/3', 'http://a.com/4'], 0);
    });

    it('drains in FIFO slices', () => {
      expect(frontier.takeBatch(3).map((entry) => entry.url)).toEqual([
        'http://a.com/1',
        'http://a.com/2',
        'http://a.com/3',
      ]);
      expect(frontier.takeBatch(3).map((entry) => entry.url)).toEqual(['http://a.com/4']);
      expect(frontier.takeBatch(3)).toEqual([]);
    });

    it('tracks the pending count without shrinking', () => {
      frontier.takeBatch(2);

      expect(frontier.pendingCount).toBe(2);
      expect(frontier.size).toBe(4);
    });

    it('returns nothing for a non-positive size', () => {
      expect(frontier.takeBatch(0)).toEqual([]);
      expect(frontier.pendingCount).toBe(4);
    });
  });
});
