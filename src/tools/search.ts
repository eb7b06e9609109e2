import type { Logger } from 'pino';
import type { SearchConfig } from '../config/agent.js';
import type { FetchLike } from '../util/fetch.js';
import { createSerperSearch } from './serper_search.js';
import { createBraveSearch } from './brave_search.js';

export interface SearchResult {
  title: string;
  link: string;
  snippet: string;
}

/** An empty result list is a valid answer, not a failure. */
export type SearchOutcome =
  | { ok: true; results: SearchResult[] }
  | { ok: false; reason: string };

export interface SearchClient {
  readonly name: string;
  search(query: string): Promise<SearchOutcome>;
}

export interface SearchDeps {
  log: Logger;
  fetchImpl?: FetchLike;
}

/** Dispatch to configured search provider */
export function createSearchClient(cfg: SearchConfig, deps: SearchDeps): SearchClient {
  return cfg.provider === 'brave' ? createBraveSearch(cfg, deps) : createSerperSearch(cfg, deps);
}

/**
 * Renders a search outcome as the text block the planning prompts read.
 */
export function formatSearchResults(outcome: SearchOutcome): string {
  if (!outcome.ok) return `Error during web search: ${outcome.reason}`;
  if (outcome.results.length === 0) return 'No good search results found.';
  let output = 'Search Results:\n';
  for (const item of outcome.results) {
    output += `- Title: ${item.title}\n`;
    output += `  Link: ${item.link}\n`;
    output += `  Snippet: ${item.snippet}\n\n`;
  }
  return output;
}
