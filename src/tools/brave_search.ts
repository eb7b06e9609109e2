import type { SearchConfig } from '../config/agent.js';
import { BraveSearchResponse } from '../schemas/search.js';
import { requestJSON } from '../util/fetch.js';
import { errorMessage } from './errors.js';
import type { SearchClient, SearchDeps, SearchResult } from './search.js';

const BRAVE_URL = 'https://api.search.brave.com/res/v1/web/search';

export function createBraveSearch(cfg: SearchConfig, deps: SearchDeps): SearchClient {
  const { log, fetchImpl } = deps;

  return {
    name: 'Brave Search',
    async search(query) {
      if (!query.trim()) {
        log.debug('❌ Brave Search: empty query');
        return { ok: false, reason: 'no_query' };
      }
      log.debug({ query }, '🔍 Brave Search');

      const params = new URLSearchParams({
        q: query,
        count: String(cfg.limit),
        text_decorations: 'false',
      });
      try {
        const raw = await requestJSON(`${BRAVE_URL}?${params.toString()}`, {
          target: 'brave',
          timeoutMs: cfg.timeoutMs,
          headers: { Accept: 'application/json', 'X-Subscription-Token': cfg.apiKey },
          fetchImpl,
        });
        const parsed = BraveSearchResponse.safeParse(raw);
        if (!parsed.success) {
          log.debug({ errors: parsed.error.issues }, 'brave_response_schema_failed');
          return { ok: false, reason: 'unexpected response shape' };
        }
        const results: SearchResult[] = (parsed.data.web?.results ?? []).slice(0, cfg.limit).map((r) => ({
          title: r.title || 'N/A',
          link: r.url || 'N/A',
          // Brave may still wrap matches in <strong> tags
          snippet: (r.description || 'N/A').replace(/<[^>]*>/g, ''),
        }));
        log.debug(`✅ Brave Search success: ${results.length} results`);
        return { ok: true, results };
      } catch (e) {
        log.warn({ query, error: errorMessage(e) }, 'brave_search_failed');
        return { ok: false, reason: errorMessage(e) };
      }
    },
  };
}
