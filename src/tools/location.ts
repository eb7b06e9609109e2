import type { Logger } from 'pino';
import { IpApiResponse } from '../schemas/location.js';
import { requestJSON, type FetchLike } from '../util/fetch.js';
import { errorMessage } from './errors.js';

/** Resolves "City, Country" from the caller's network origin, or an "Error..." string. */
export interface LocationResolver {
  resolve(): Promise<string>;
}

export function createLocationResolver(
  cfg: { url: string; timeoutMs: number },
  deps: { log: Logger; fetchImpl?: FetchLike },
): LocationResolver {
  const { log, fetchImpl } = deps;

  return {
    async resolve() {
      try {
        const raw = await requestJSON(cfg.url, { target: 'location', timeoutMs: cfg.timeoutMs, fetchImpl });
        const parsed = IpApiResponse.safeParse(raw);
        const city = parsed.success ? parsed.data.city?.trim() : undefined;
        const country = parsed.success ? parsed.data.country?.trim() : undefined;
        if (city && country) {
          log.debug('📍 Location resolved');
          return `${city}, ${country}`;
        }
        return 'Error: Could not determine location.';
      } catch (e) {
        log.warn({ error: errorMessage(e) }, 'location_lookup_failed');
        return `Error getting location: ${errorMessage(e)}`;
      }
    },
  };
}
