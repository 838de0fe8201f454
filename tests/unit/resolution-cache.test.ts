import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ResolutionCache } from '../../src/modules/cache/resolution-cache';

describe('ResolutionCache', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'resolution-cache-'));
    file = path.join(dir, 'nested', 'cache.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('tells a negative result apart from an absent key', () => {
    const cache = new ResolutionCache(file);
    cache.put('Nobody Ltd', null);

    expect(cache.get('Nobody Ltd')).toEqual({ status: 'no_result' });
    expect(cache.get('Somebody Ltd')).toBeUndefined();
    expect(cache.has('Nobody Ltd')).toBe(true);
  });

  it('persists every write and reloads it', () => {
    const cache = new ResolutionCache(file);
    cache.put('Acme HVAC Services LLC', 'https://acmehvac.com/home');
    cache.put('Nobody Ltd', null);

    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
      'Acme HVAC Services LLC': 'https://acmehvac.com/home',
      'Nobody Ltd': '',
    });

    const reloaded = new ResolutionCache(file);
    expect(reloaded.size).toBe(2);
    expect(reloaded.get('Acme HVAC Services LLC')).toEqual({ status: 'resolved', url: 'https://acmehvac.com/home' });
    expect(reloaded.get('Nobody Ltd')).toEqual({ status: 'no_result' });
  });

  it('keys on the exact raw name', () => {
    const cache = new ResolutionCache(file);
    cache.put('Acme HVAC', 'https://acmehvac.com');
    expect(cache.get('acme hvac')).toBeUndefined();
  });

  it('forgets a deleted key on disk too', () => {
    const cache = new ResolutionCache(file);
    cache.put('Acme HVAC', 'https://acmehvac.com');

    expect(cache.delete('Acme HVAC')).toBe(true);
    expect(cache.delete('Acme HVAC')).toBe(false);
    expect(new ResolutionCache(file).has('Acme HVAC')).toBe(false);
  });

  it('starts empty on an unreadable or non-object file', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{not json');
    expect(new ResolutionCache(file).size).toBe(0);

    fs.writeFileSync(file, '["a", "b"]');
    expect(new ResolutionCache(file).size).toBe(0);
  });

  it('ignores non-string values in the file', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ good: 'https://good.com', bad: 42 }));
    const cache = new ResolutionCache(file);
    expect(cache.size).toBe(1);
    expect(cache.has('bad')).toBe(false);
  });
});
