import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import { requestText, type FetchLike } from '../util/fetch.js';
import { errorMessage } from './errors.js';

/**
 * Retrieves a page and returns its readable text. Never throws:
 * failures come back as text starting with "Error".
 */
export interface PageFetcher {
  fetchPage(url: string): Promise<string>;
}

export interface PageFetcherConfig {
  timeoutMs: number;
  maxChars: number;
}

export const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: 'https://www.google.com/',
  'Upgrade-Insecure-Requests': '1',
  DNT: '1',
};

/**
 * Collapses raw text: every line is trimmed and split on runs of two spaces,
 * empty pieces are dropped and the rest joined one per line.
 */
export function collapseWhitespace(text: string): string {
  return text
    .split(/\r?\n/)
    .flatMap((line) => line.trim().split('  '))
    .map((phrase) => phrase.trim())
    .filter(Boolean)
    .join('\n');
}

/** Cuts by code point so a surrogate pair is never split. */
function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return Array.from(text).slice(0, maxChars).join('');
}

export function extractPageText(body: string, contentType: string, maxChars: number): string {
  const isHtml = contentType === '' || /html|xml/i.test(contentType);
  if (!isHtml) return truncate(collapseWhitespace(body), maxChars);
  const $ = cheerio.load(body);
  $('script, style, noscript').remove();
  return truncate(collapseWhitespace($.root().text()), maxChars);
}

export function createPageFetcher(cfg: PageFetcherConfig, deps: { log: Logger; fetchImpl?: FetchLike }): PageFetcher {
  const { log, fetchImpl } = deps;

  return {
    async fetchPage(url) {
      log.debug({ url }, '📄 Browsing website');
      try {
        const { body, contentType } = await requestText(url, {
          target: 'browse',
          timeoutMs: cfg.timeoutMs,
          headers: BROWSER_HEADERS,
          fetchImpl,
        });
        const text = extractPageText(body, contentType, cfg.maxChars);
        if (!text) return `Error: No text content found at ${url}`;
        log.debug({ url, chars: text.length }, '✅ Browsed website');
        return text;
      } catch (e) {
        log.warn({ url, error: errorMessage(e) }, 'browse_failed');
        return `Error browsing website ${url}: ${errorMessage(e)}`;
      }
    },
  };
}
