import type { Logger } from 'pino';
import type { PageFetcher } from '../tools/page_fetcher.js';
import { isErrorText } from '../tools/errors.js';

export interface ResearchEntry {
  sourceUrl: string;
  text: string;
}

export const BROWSE_FAILED_MESSAGE =
  "I tried to browse several websites but was blocked or couldn't find any information. Please try again.";

const SOURCE_SEPARATOR = '\n\n---\n\n';

/**
 * Fetches each URL once, in order, one at a time. Pages whose text starts
 * with "Error" are left out; the rest keep their original order.
 */
export async function researchPages(
  urls: string[],
  deps: { fetcher: PageFetcher; log: Logger; onPage?: (url: string, index: number) => void },
): Promise<ResearchEntry[]> {
  const { fetcher, log } = deps;
  const entries: ResearchEntry[] = [];
  for (const [index, url] of urls.entries()) {
    deps.onPage?.(url, index);
    const text = await fetcher.fetchPage(url);
    if (isErrorText(text)) {
      log.debug({ url, reason: text }, 'Skipping page due to an error');
      continue;
    }
    entries.push({ sourceUrl: url, text });
  }
  log.debug({ attempted: urls.length, usable: entries.length }, 'research_complete');
  return entries;
}

export function formatResearch(entries: readonly ResearchEntry[]): string {
  return entries.map((e) => `Content from ${e.sourceUrl}:\n${e.text}`).join(SOURCE_SEPARATOR);
}
