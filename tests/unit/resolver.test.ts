import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ResolutionCache } from '../../src/modules/cache/resolution-cache';
import { WebsiteResolver } from '../../src/modules/resolver';
import { ACME_RESULTS, FakeSearchProvider } from '../helpers/fakes';

const ACME = 'Acme HVAC Services LLC';

describe('WebsiteResolver', () => {
  let dir: string;
  let cache: ResolutionCache;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'resolver-'));
    cache = new ResolutionCache(path.join(dir, 'cache.json'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('picks the official site over a social profile', async () => {
    const provider = new FakeSearchProvider(() => ACME_RESULTS);
    const resolver = new WebsiteResolver(provider, cache);

    await expect(resolver.resolve(ACME)).resolves.toBe('https://acmehvac.com/home');
    expect(provider.queries).toEqual([`${ACME} official site`]);
  });

  it('answers repeated names from the cache without searching again', async () => {
    const provider = new FakeSearchProvider(() => ACME_RESULTS);
    const resolver = new WebsiteResolver(provider, cache);

    const first = await resolver.resolve(ACME);
    const second = await resolver.resolve(ACME);

    expect(second).toBe(first);
    expect(provider.queries).toHaveLength(1);
  });

  it('caches negative outcomes', async () => {
    const provider = new FakeSearchProvider(() => []);
    const resolver = new WebsiteResolver(provider, cache);

    await expect(resolver.resolve('Nobody Ltd')).resolves.toBeNull();
    await expect(resolver.resolve('Nobody Ltd')).resolves.toBeNull();
    expect(provider.queries).toHaveLength(1);
    expect(cache.get('Nobody Ltd')).toEqual({ status: 'no_result' });
  });

  it('rejects a best candidate below the threshold', async () => {
    const resolver = new WebsiteResolver(new FakeSearchProvider(() => ACME_RESULTS), cache);
    await expect(resolver.resolve(ACME, 200)).resolves.toBeNull();
    expect(cache.get(ACME)).toEqual({ status: 'no_result' });
  });

  it('runs the extra query when enabled', async () => {
    const provider = new FakeSearchProvider(() => []);
    const resolver = new WebsiteResolver(provider, cache, { extraQuery: true });

    await resolver.resolve(ACME);
    expect(provider.queries).toEqual([`${ACME} official site`, `${ACME} company`]);
  });

  it('keeps the first of equally scored candidates', async () => {
    const provider = new FakeSearchProvider(() => [
      { title: 'Acme HVAC', url: 'https://acmehvac.com/home', snippet: '' },
      { title: 'Acme HVAC', url: 'https://acmehvac.net/home', snippet: '' },
    ]);
    const resolver = new WebsiteResolver(provider, cache);
    await expect(resolver.resolve(ACME)).resolves.toBe('https://acmehvac.com/home');
  });

  it('returns null for an empty name without searching', async () => {
    const provider = new FakeSearchProvider(() => ACME_RESULTS);
    await expect(new WebsiteResolver(provider, cache).resolve('')).resolves.toBeNull();
    expect(provider.queries).toHaveLength(0);
  });

  it('does not cache an aborted resolution', async () => {
    const controller = new AbortController();
    const provider = new FakeSearchProvider(() => {
      controller.abort();
      return ACME_RESULTS;
    });
    const resolver = new WebsiteResolver(provider, cache);

    await expect(resolver.resolve(ACME, 35, controller.signal)).resolves.toBeNull();
    expect(cache.has(ACME)).toBe(false);
  });
});
