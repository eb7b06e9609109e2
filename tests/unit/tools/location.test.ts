import { createLocationResolver } from '../../../src/tools/location.js';
import { fakeFetch, jsonResponse, silentLog } from '../../helpers/fakes.js';

const cfg = { url: 'http://geo.example.test/json/', timeoutMs: 1000 };

describe('createLocationResolver', () => {
  it('returns "City, Country" from the lookup', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ status: 'success', city: 'Seattle', country: 'USA' }));
    const resolver = createLocationResolver(cfg, { log: silentLog, fetchImpl });

    await expect(resolver.resolve()).resolves.toBe('Seattle, USA');
    expect(fetchImpl.calls[0]?.url).toBe('http://geo.example.test/json/');
  });

  it('reports an answer without city or country', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ status: 'fail', message: 'private range' }));
    const resolver = createLocationResolver(cfg, { log: silentLog, fetchImpl });
    await expect(resolver.resolve()).resolves.toBe('Error: Could not determine location.');
  });

  it('reports lookup failures', async () => {
    const fetchImpl = fakeFetch(() => Promise.reject(new Error('ECONNRESET')));
    const resolver = createLocationResolver(cfg, { log: silentLog, fetchImpl });
    await expect(resolver.resolve()).resolves.toBe('Error getting location: ECONNRESET');
  });
});
