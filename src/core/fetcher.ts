/**
 * Fetcher
 * One bounded-timeout GET per call; every failure comes back as a value
 */

import { FetchLike, FetchResult } from '../types/crawl.types';
import { USER_AGENT } from '../config/constants';
import { errorMessage, errorName } from '../utils/errors';

export interface FetchPageOptions {
  fetchImpl?: FetchLike;
  userAgent?: string;
  /** Which bodies are read, by Content-Type (default: text/html only) */
  readBody?: (contentType: string) => boolean;
}

/**
 * Check whether a content type is eligible for link extraction
 *
 * @param contentType - Raw Content-Type header value
 * @returns True for text/html (parameters ignored)
 */
export function isHtmlContentType(contentType: string | null | undefined): boolean {
  if (!contentType) return false;
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return mediaType === 'text/html';
}

function isTimeout(error: unknown): boolean {
  const name = errorName(error);
  return name === 'TimeoutError' || name === 'AbortError';
}

function declaredLength(response: Response): number {
  const length = Number(response.headers.get('content-length'));
  return Number.isInteger(length) && length > 0 ? length : 0;
}

/**
 * Fetch a single URL
 *
 * Non-2xx, timeout, DNS and connection failures never throw past this function.
 * Bodies rejected by `readBody` are cancelled unread and reported with empty
 * text and their declared Content-Length.
 *
 * @param url - Absolute URL
 * @param timeoutMs - Timeout for the whole request, body included
 * @returns Tagged fetch result
 */
export async function fetchPage(
  url: string,
  timeoutMs: number,
  options: FetchPageOptions = {}
): Promise<FetchResult> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const startedAt = Date.now();

  try {
    const response = await fetchImpl(url, {
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        'User-Agent': options.userAgent ?? USER_AGENT,
        Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
      },
    });

    if (!response.ok) {
      await response.body?.cancel();
      return {
        kind: 'http-error',
        url,
        statusCode: response.status,
        durationMs: Date.now() - startedAt,
      };
    }

    const contentType = response.headers.get('content-type') ?? '';
    const readBody = options.readBody ?? isHtmlContentType;
    if (!readBody(contentType)) {
      await response.body?.cancel();
      return {
        kind: 'body',
        url,
        finalUrl: response.url || url,
        status: response.status,
        contentType,
        text: '',
        bytes: declaredLength(response),
        durationMs: Date.now() - startedAt,
      };
    }

    const text = await response.text();
    return {
      kind: 'body',
      url,
      finalUrl: response.url || url,
      status: response.status,
      contentType,
      text,
      bytes: Buffer.byteLength(text),
      durationMs: Date.now() - startedAt,
    };
  } catch (error) {
    return {
      kind: 'network-error',
      url,
      cause: errorMessage(error),
      timedOut: isTimeout(error),
      durationMs: Date.now() - startedAt,
    };
  }
}
