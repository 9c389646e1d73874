/**
 * Anchor link extraction
 */

import * as cheerio from 'cheerio';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

/**
 * Collect raw href values of every anchor in a document
 *
 * Links are returned as written (possibly relative); normalization happens later.
 * A document that cannot be parsed yields an empty set.
 *
 * @param html - Raw HTML string
 * @returns Set of raw link strings
 */
export function extractLinks(html: string): Set<string> {
  const links = new Set<string>();
  if (!html) return links;

  try {
    const $ = cheerio.load(html);

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href')?.trim();
      if (href) {
        links.add(href);
      }
    });
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Link extraction failed');
    links.clear();
  }

  return links;
}
