import type { SearchConfig } from '../config/agent.js';
import { SerperSearchResponse } from '../schemas/search.js';
import { requestJSON } from '../util/fetch.js';
import { errorMessage } from './errors.js';
import type { SearchClient, SearchDeps, SearchResult } from './search.js';

const SERPER_URL = 'https://google.serper.dev/search';

export function createSerperSearch(cfg: SearchConfig, deps: SearchDeps): SearchClient {
  const { log, fetchImpl } = deps;

  return {
    name: 'Serper',
    async search(query) {
      if (!query.trim()) {
        log.debug('❌ Serper: empty query');
        return { ok: false, reason: 'no_query' };
      }
      log.debug({ query }, '🔍 Serper search');

      try {
        const raw = await requestJSON(SERPER_URL, {
          target: 'serper',
          timeoutMs: cfg.timeoutMs,
          method: 'POST',
          headers: { 'X-API-KEY': cfg.apiKey, 'Content-Type': 'application/json' },
          body: JSON.stringify({ q: query }),
          fetchImpl,
        });
        const parsed = SerperSearchResponse.safeParse(raw);
        if (!parsed.success) {
          log.debug({ errors: parsed.error.issues }, 'serper_response_schema_failed');
          return { ok: false, reason: 'unexpected response shape' };
        }
        const results: SearchResult[] = (parsed.data.organic ?? []).slice(0, cfg.limit).map((item) => ({
          title: item.title || 'N/A',
          link: item.link || 'N/A',
          snippet: item.snippet || 'N/A',
        }));
        log.debug(`✅ Serper success: ${results.length} results`);
        return { ok: true, results };
      } catch (e) {
        log.warn({ query, error: errorMessage(e) }, 'serper_search_failed');
        return { ok: false, reason: errorMessage(e) };
      }
    },
  };
}
